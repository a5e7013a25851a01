#!/usr/bin/env -S node --import tsx

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import { parseProgress } from "./adapters/cli/args.ts";
import {
  formatAdd,
  formatError,
  formatList,
  formatStatus,
  formatStopAll,
  formatSummary,
} from "./adapters/cli/formatter.ts";
import { runSession, TrackingSession } from "./adapters/cli/session.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { JsonTaskRepository } from "./adapters/repositories/json-task-repo.ts";
import { resolveConfig, type TaskClockConfig } from "./config.ts";
import { TaskPartition } from "./domain/entities/task-partition.ts";
import { SnapshotAutosave } from "./domain/use-cases/snapshot/autosave.ts";
import { LoadSnapshotUseCase } from "./domain/use-cases/snapshot/load-snapshot.ts";
import { AddTaskUseCase } from "./domain/use-cases/task/add-task.ts";
import { DeleteTaskUseCase } from "./domain/use-cases/task/delete-task.ts";
import { EditTaskUseCase } from "./domain/use-cases/task/edit-task.ts";
import {
  type ListFilter,
  ListTasksUseCase,
} from "./domain/use-cases/task/list-tasks.ts";
import { SummarizeTasksUseCase } from "./domain/use-cases/task/summarize-tasks.ts";
import {
  type TargetStatus,
  UpdateStatusUseCase,
} from "./domain/use-cases/task/update-status.ts";
import { TkError } from "./types.ts";

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Option types
// ============================================================================

type GlobalOptions = {
  dataDir?: string;
};

type JsonOption = {
  json?: boolean;
};

type AddOptions = JsonOption & {
  memo?: string;
  due?: string;
  progress?: string;
};

type ListOptions = JsonOption & {
  completed?: boolean;
  all?: boolean;
};

type EditOptions = JsonOption & {
  title?: string;
  memo?: string;
  due?: string;
  progress?: string;
  completed?: boolean;
};

// ============================================================================
// Workspace
// ============================================================================

interface Workspace {
  readonly config: TaskClockConfig;
  readonly partition: TaskPartition;
  readonly autosave: SnapshotAutosave;
}

/**
 * Load the snapshot into a fresh partition and start saving changes.
 */
async function openWorkspace(
  globals: GlobalOptions,
  onWriteError: (error: TkError) => void,
): Promise<Workspace> {
  const config = resolveConfig({ dataDir: globals.dataDir });
  const taskRepo = new JsonTaskRepository(
    new NodeFileSystem(),
    config.snapshotPath,
  );
  const partition = new TaskPartition();
  await new LoadSnapshotUseCase({ partition, taskRepo }).execute();

  const autosave = new SnapshotAutosave(partition, taskRepo, onWriteError);
  autosave.attach();
  return { config, partition, autosave };
}

/**
 * Run one command against the stored tasks and wait for its write.
 * The first failed write is rethrown.
 */
async function withTasks<T>(
  globals: GlobalOptions,
  fn: (partition: TaskPartition) => T,
): Promise<T> {
  const writeErrors: TkError[] = [];
  const { partition, autosave } = await openWorkspace(
    globals,
    (error) => writeErrors.push(error),
  );
  try {
    const result = fn(partition);
    await autosave.flush();
    const [writeError] = writeErrors;
    if (writeError) {
      throw writeError;
    }
    return result;
  } finally {
    autosave.close();
  }
}

// ============================================================================
// Helpers
// ============================================================================

function handleError(e: unknown, json: boolean): void {
  if (e instanceof TkError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    process.exitCode = 1;
    return;
  }
  throw e;
}

function listFilter(options: ListOptions): ListFilter {
  if (options.all) return "all";
  return options.completed ? "completed" : "active";
}

function optionalProgress(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseProgress(value);
}

// ============================================================================
// Commands
// ============================================================================

function buildCli(): Command {
  const cli = new Command()
    .name("tk")
    .version(VERSION)
    .description(
      "Taskclock - Track tasks, progress and time spent\n\n" +
        "Core workflow:\n" +
        '  1. tk add "task"              # Create a task (returns its ID)\n' +
        "  2. tk session                 # Start/stop timers interactively\n" +
        "  3. tk edit <id> --progress 50 # Record progress\n" +
        "  4. tk done <id>               # Move to completed\n\n" +
        "Key principles:\n" +
        "  - Progress 100 and completed always go together\n" +
        "  - Timers only run inside 'tk session' and stop when it ends\n" +
        "  - IDs can be abbreviated to any unique prefix\n\n" +
        "See 'tk <command> --help' for details",
    )
    .option("--data-dir <dir>", "Directory holding tasks.json")
    .exitOverride();

  const globals = (): GlobalOptions => cli.opts<GlobalOptions>();

  cli.command("add")
    .description("Create a task")
    .argument("<title>", "Task title")
    .option("--memo <memo>", "Free-form note")
    .option("--due <date>", "Due date (YYYY-MM-DD, default: today)")
    .option("--progress <n>", "Initial progress (0-100)")
    .option("--json", "Output as JSON")
    .action(async (title: string, options: AddOptions) => {
      try {
        const output = await withTasks(globals(), (partition) =>
          new AddTaskUseCase({ partition }).execute({
            title,
            memo: options.memo,
            dueDate: options.due,
            progress: optionalProgress(options.progress),
          }));
        console.log(options.json ? JSON.stringify(output) : formatAdd(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli.command("list")
    .description("List tasks (active by default)")
    .option("--completed", "Show completed tasks only")
    .option("--all", "Show active and completed tasks")
    .option("--json", "Output as JSON")
    .action(async (options: ListOptions) => {
      try {
        const output = await withTasks(globals(), (partition) =>
          new ListTasksUseCase(partition).execute({
            filter: listFilter(options),
          }));
        console.log(options.json ? JSON.stringify(output) : formatList(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli.command("edit")
    .description("Edit task fields")
    .argument("<taskId>", "Task ID or unique prefix")
    .option("--title <title>", "New title")
    .option("--memo <memo>", "New note")
    .option("--due <date>", "New due date (YYYY-MM-DD)")
    .option("--progress <n>", "New progress (0-100)")
    .option("--completed", "Mark completed (sets progress to 100)")
    .option("--no-completed", "Mark not completed (progress 100 becomes 99)")
    .option("--json", "Output as JSON")
    .action(async (taskId: string, options: EditOptions) => {
      try {
        const output = await withTasks(globals(), (partition) =>
          new EditTaskUseCase(partition).execute({
            taskId,
            title: options.title,
            memo: options.memo,
            dueDate: options.due,
            progress: optionalProgress(options.progress),
            completed: options.completed,
          }));
        console.log(
          options.json ? JSON.stringify(output) : formatStatus(output),
        );
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  const statusCommand = (
    name: string,
    description: string,
    targetStatus: TargetStatus,
  ) =>
    cli.command(name)
      .description(description)
      .argument("<taskId>", "Task ID or unique prefix")
      .option("--json", "Output as JSON")
      .action(async (taskId: string, options: JsonOption) => {
        try {
          const output = await withTasks(globals(), (partition) =>
            new UpdateStatusUseCase(partition).execute({
              taskId,
              targetStatus,
            }));
          console.log(
            options.json ? JSON.stringify(output) : formatStatus(output),
          );
        } catch (e) {
          handleError(e, options.json ?? false);
        }
      });

  statusCommand("done", "Mark a task completed", "completed");
  statusCommand("restore", "Move a completed task back to active", "active");

  cli.command("rm")
    .description("Delete a task")
    .argument("<taskId>", "Task ID or unique prefix")
    .option("--json", "Output as JSON")
    .action(async (taskId: string, options: JsonOption) => {
      try {
        const output = await withTasks(globals(), (partition) =>
          new DeleteTaskUseCase(partition).execute({ taskId }));
        console.log(
          options.json ? JSON.stringify(output) : formatStatus(output),
        );
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli.command("summary")
    .description("Show task counts and average progress")
    .option("--json", "Output as JSON")
    .action(async (options: JsonOption) => {
      try {
        const output = await withTasks(globals(), (partition) =>
          new SummarizeTasksUseCase(partition).execute());
        console.log(
          options.json ? JSON.stringify(output) : formatSummary(output),
        );
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  cli.command("session")
    .description("Track time interactively (type 'help' inside)")
    .action(async () => {
      try {
        const { config, partition, autosave } = await openWorkspace(
          globals(),
          (error) => {
            console.error(formatError(error));
            process.exitCode = 1;
          },
        );
        const session = new TrackingSession({ partition, autosave });
        const output = await runSession(session, {
          input: process.stdin,
          output: process.stdout,
          tickIntervalMs: config.tickIntervalMs,
        });
        autosave.close();
        if (output.stopped > 0) {
          console.log(formatStopAll(output));
        }
      } catch (e) {
        handleError(e, false);
      }
    });

  return cli;
}

// ============================================================================
// Main
// ============================================================================

export async function main(args: string[]): Promise<void> {
  const cli = buildCli();
  // Show help when no arguments provided
  if (args.length === 0) {
    console.log(cli.helpInformation());
    return;
  }
  try {
    await cli.parseAsync(args, { from: "user" });
  } catch (e) {
    // Usage errors are already printed by commander
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    throw e;
  }
}

// Run if executed directly
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  await main(process.argv.slice(2));
}
