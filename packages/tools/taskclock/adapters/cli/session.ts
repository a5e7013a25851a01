/**
 * Interactive tracking session (`tk session`).
 *
 * Tracking state is never persisted, so timing only makes sense inside one
 * long-running process. The session keeps the partition in memory, applies
 * one command per input line and refreshes the prompt once per tick with
 * the live elapsed time of every tracking task. The tick only reads.
 *
 * Leaving the session (quit, end of input, Ctrl-C) stops every open
 * session and waits for the last snapshot write.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { TkError } from "../../domain/entities/errors.ts";
import type { StopAllOutput } from "../../domain/entities/outputs.ts";
import type { TaskPartition } from "../../domain/entities/task-partition.ts";
import type { SnapshotAutosave } from "../../domain/use-cases/snapshot/autosave.ts";
import { EditTaskUseCase } from "../../domain/use-cases/task/edit-task.ts";
import { ListTasksUseCase } from "../../domain/use-cases/task/list-tasks.ts";
import { SummarizeTasksUseCase } from "../../domain/use-cases/task/summarize-tasks.ts";
import { UpdateStatusUseCase } from "../../domain/use-cases/task/update-status.ts";
import { StopAllTrackingUseCase } from "../../domain/use-cases/tracking/stop-all-tracking.ts";
import { TrackTimeUseCase } from "../../domain/use-cases/tracking/track-time.ts";
import { parseProgress } from "./args.ts";
import {
  formatError,
  formatList,
  formatStatus,
  formatSummary,
  formatTracking,
} from "./formatter.ts";

export const SESSION_HELP = [
  "commands:",
  "  start <id>           start tracking",
  "  stop <id>            stop tracking",
  "  done <id>            mark completed",
  "  restore <id>         move back to active",
  "  progress <id> <n>    set progress (0-100)",
  "  list                 show all tasks",
  "  summary              show overall progress",
  "  help                 show this help",
  "  quit                 stop tracking and leave",
].join("\n");

export type SessionReply = {
  readonly output: string;
  readonly done: boolean;
};

export interface TrackingSessionDeps {
  readonly partition: TaskPartition;
  readonly autosave: SnapshotAutosave;
  readonly getNow?: () => Date;
}

export class TrackingSession {
  private readonly getNow: () => Date;

  constructor(private readonly deps: TrackingSessionDeps) {
    this.getNow = deps.getNow ?? (() => new Date());
  }

  /**
   * Apply one input line. Domain errors are reported in the reply.
   */
  handleLine(line: string): SessionReply {
    const [first, ...args] = line.trim().split(/\s+/).filter(Boolean);
    if (!first) {
      return { output: "", done: false };
    }
    const command = first.toLowerCase();
    if (command === "quit" || command === "exit") {
      return { output: "", done: true };
    }

    try {
      return { output: this.run(command, args), done: false };
    } catch (e) {
      if (e instanceof TkError) {
        return { output: formatError(e), done: false };
      }
      throw e;
    }
  }

  /**
   * Prompt text with the live time of tracking tasks. Read-only.
   */
  prompt(): string {
    const list = new ListTasksUseCase(this.deps.partition, this.getNow)
      .execute({ filter: "active" });
    const tracking = formatTracking(list.active ?? []);
    return tracking ? `[${tracking}] tk> ` : "tk> ";
  }

  /**
   * Flush hook: stop every open session and wait for pending writes.
   */
  async suspend(): Promise<StopAllOutput> {
    const output = new StopAllTrackingUseCase(
      this.deps.partition,
      this.getNow,
    ).execute();
    await this.deps.autosave.flush();
    return output;
  }

  private run(command: string, args: readonly string[]): string {
    const { partition } = this.deps;

    switch (command) {
      case "start":
      case "stop": {
        const output = new TrackTimeUseCase(partition, this.getNow).execute({
          taskId: requireArg(args, 0, `${command} <id>`),
          action: command === "start" ? "start" : "stop",
        });
        return formatStatus(output);
      }
      case "done":
      case "restore": {
        const output = new UpdateStatusUseCase(partition, this.getNow).execute({
          taskId: requireArg(args, 0, `${command} <id>`),
          targetStatus: command === "done" ? "completed" : "active",
        });
        return formatStatus(output);
      }
      case "progress": {
        const taskId = requireArg(args, 0, "progress <id> <n>");
        const progress = parseProgress(requireArg(args, 1, "progress <id> <n>"));
        const output = new EditTaskUseCase(partition, this.getNow).execute({
          taskId,
          progress,
        });
        return formatStatus(output);
      }
      case "list":
        return formatList(
          new ListTasksUseCase(partition, this.getNow).execute({
            filter: "all",
          }),
        );
      case "summary":
        return formatSummary(new SummarizeTasksUseCase(partition).execute());
      case "help":
        return SESSION_HELP;
      default:
        throw new TkError(
          "invalid_args",
          `Unknown command: ${command} (try 'help')`,
        );
    }
  }
}

function requireArg(
  args: readonly string[],
  index: number,
  usage: string,
): string {
  const value = args[index];
  if (value === undefined) {
    throw new TkError("invalid_args", `Usage: ${usage}`);
  }
  return value;
}

// ============================================================================
// Terminal wiring
// ============================================================================

export interface RunSessionOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly tickIntervalMs: number;
}

/**
 * Drive a session from a line-oriented stream until quit or end of input.
 */
export function runSession(
  session: TrackingSession,
  options: RunSessionOptions,
): Promise<StopAllOutput> {
  const rl = createInterface({ input: options.input, output: options.output });

  const refresh = () => {
    rl.setPrompt(session.prompt());
    // Redraw only on a terminal and only while nothing is being typed
    if (rl.terminal && rl.line.length === 0) {
      rl.prompt(true);
    }
  };
  const ticker = setInterval(refresh, options.tickIntervalMs);

  rl.on("line", (line) => {
    const reply = session.handleLine(line);
    if (reply.output) {
      options.output.write(`${reply.output}\n`);
    }
    if (reply.done) {
      rl.close();
      return;
    }
    rl.setPrompt(session.prompt());
    rl.prompt();
  });
  rl.on("SIGINT", () => rl.close());

  return new Promise((resolve, reject) => {
    rl.on("close", () => {
      clearInterval(ticker);
      session.suspend().then(resolve, reject);
    });
    rl.setPrompt(session.prompt());
    rl.prompt();
  });
}
