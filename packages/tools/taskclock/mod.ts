/**
 * Taskclock - personal task tracker with progress and time tracking.
 *
 * @example
 * ```ts
 * import { AddTaskUseCase, TaskPartition } from "@taskclock/tools";
 *
 * const partition = new TaskPartition();
 * const { id } = new AddTaskUseCase({ partition }).execute({ title: "Write report" });
 * ```
 *
 * @module
 */

export * from "./types.ts";
export { main, VERSION } from "./cli.ts";
export { resolveConfig } from "./config.ts";
export type { ConfigOptions, Env, TaskClockConfig } from "./config.ts";

// Entities
export {
  isCalendarDate,
  startOfDay,
  toCalendarDate,
} from "./domain/entities/calendar.ts";
export { Task } from "./domain/entities/task.ts";
export type { TaskChange, TaskListener } from "./domain/entities/task.ts";
export { TaskPartition } from "./domain/entities/task-partition.ts";
export type { PartitionListener } from "./domain/entities/task-partition.ts";
export {
  createTaskState,
  taskStateFromRecord,
  taskStateToRecord,
} from "./domain/entities/task-state.ts";
export {
  generateTaskId,
  getShortId,
  normalizeTaskState,
  resolveIdPrefix,
} from "./domain/entities/task-helpers.ts";

// Ports
export type { FileSystem } from "./domain/ports/filesystem.ts";
export type { TaskRepository } from "./domain/ports/task-repository.ts";

// Use cases
export { AddTaskUseCase } from "./domain/use-cases/task/add-task.ts";
export { DeleteTaskUseCase } from "./domain/use-cases/task/delete-task.ts";
export { EditTaskUseCase } from "./domain/use-cases/task/edit-task.ts";
export { ListTasksUseCase } from "./domain/use-cases/task/list-tasks.ts";
export type { ListFilter } from "./domain/use-cases/task/list-tasks.ts";
export { SummarizeTasksUseCase } from "./domain/use-cases/task/summarize-tasks.ts";
export { UpdateStatusUseCase } from "./domain/use-cases/task/update-status.ts";
export type { TargetStatus } from "./domain/use-cases/task/update-status.ts";
export { TrackTimeUseCase } from "./domain/use-cases/tracking/track-time.ts";
export type { TrackAction } from "./domain/use-cases/tracking/track-time.ts";
export { StopAllTrackingUseCase } from "./domain/use-cases/tracking/stop-all-tracking.ts";
export { LoadSnapshotUseCase } from "./domain/use-cases/snapshot/load-snapshot.ts";
export { SnapshotAutosave } from "./domain/use-cases/snapshot/autosave.ts";

// Adapters
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { JsonTaskRepository } from "./adapters/repositories/json-task-repo.ts";
export {
  deserializeSnapshot,
  SNAPSHOT_VERSION,
  serializeSnapshot,
} from "./adapters/repositories/snapshot-codec.ts";
export { TrackingSession } from "./adapters/cli/session.ts";
