// Taskclock types

export type { CalendarDate } from "./domain/entities/calendar.ts";
export { TkError } from "./domain/entities/errors.ts";
export type { TkErrorCode } from "./domain/entities/errors.ts";
export type {
  AddOutput,
  ListOutput,
  LoadOutput,
  StatusOutput,
  StopAllOutput,
  SummaryOutput,
  TaskView,
} from "./domain/entities/outputs.ts";
export type { TaskSummary } from "./domain/entities/task-partition.ts";
export type {
  RawTaskRecord,
  TaskField,
  TaskRecord,
  TaskState,
  TrackingState,
} from "./domain/entities/task-state.ts";
