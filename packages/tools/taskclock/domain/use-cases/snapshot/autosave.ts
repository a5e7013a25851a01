// SnapshotAutosave - Write the task set after every persisted change
//
// Records are captured synchronously when the partition reports a change;
// writes run one after another in that order. A failed write goes to
// `onError` and leaves the in-memory tasks untouched.

import { TkError } from "../../entities/errors.ts";
import type { Task } from "../../entities/task.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";
import type { TaskRecord } from "../../entities/task-state.ts";
import { taskStateToRecord } from "../../entities/task-state.ts";
import type { TaskRepository } from "../../ports/task-repository.ts";

export class SnapshotAutosave {
  private pending: Promise<void> = Promise.resolve();
  private detach: (() => void) | null = null;

  constructor(
    private readonly partition: TaskPartition,
    private readonly taskRepo: TaskRepository,
    private readonly onError: (error: TkError) => void,
  ) {}

  /** Start listening to the partition. Idempotent. */
  attach(): void {
    if (this.detach) return;
    this.detach = this.partition.onChange(() => this.schedule());
  }

  /** Stop listening; queued writes still complete. */
  close(): void {
    this.detach?.();
    this.detach = null;
  }

  /** Queue a write of the current task set. */
  schedule(): void {
    const active = this.partition.active.map(toRecord);
    const completed = this.partition.completed.map(toRecord);
    this.pending = this.pending
      .then(() => this.taskRepo.save(active, completed))
      .catch((e: unknown) => this.onError(asTkError(e)));
  }

  /** Resolve once every queued write has finished. */
  flush(): Promise<void> {
    return this.pending;
  }
}

function toRecord(task: Task): TaskRecord {
  return taskStateToRecord(task.id, task.state);
}

function asTkError(e: unknown): TkError {
  if (e instanceof TkError) return e;
  const reason = e instanceof Error ? e.message : String(e);
  return new TkError("io_error", `Failed to save tasks: ${reason}`);
}
