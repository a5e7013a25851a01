// Task state - immutable values behind a Task entity and their persisted form

import type { CalendarDate } from "./calendar.ts";
import { calendarDatePrefix } from "./calendar.ts";

export const UNTITLED_TASK_TITLE = "(untitled)";

/** Progress a task falls back to when it leaves the completed state. */
export const RESTORED_PROGRESS = 99;

export type TrackingState =
  | { readonly kind: "idle" }
  | { readonly kind: "tracking"; readonly since: number }; // epoch ms

export const IDLE: TrackingState = { kind: "idle" };

/**
 * Immutable snapshot of everything a task knows.
 */
export type TaskState = {
  readonly title: string;
  readonly memo: string;
  readonly dueDate: CalendarDate;
  readonly progress: number; // integer 0..100
  readonly isCompleted: boolean;
  readonly totalWorkSeconds: number;
  readonly dailyWorkSeconds: number; // applies to dailyDate only
  readonly dailyDate: CalendarDate;
  readonly tracking: TrackingState;
};

export type TaskField = keyof TaskState;

export const TASK_FIELDS: readonly TaskField[] = [
  "title",
  "memo",
  "dueDate",
  "progress",
  "isCompleted",
  "totalWorkSeconds",
  "dailyWorkSeconds",
  "dailyDate",
  "tracking",
];

/** Fields that make it into a snapshot (tracking never does). */
export const PERSISTED_FIELDS: ReadonlySet<TaskField> = new Set(
  TASK_FIELDS.filter((field) => field !== "tracking"),
);

/**
 * TaskRecord matches one entry of the snapshot file.
 * Uses snake_case to match the JSON field names.
 */
export type TaskRecord = {
  readonly id: string;
  readonly title: string;
  readonly memo: string;
  readonly due_date: CalendarDate;
  readonly progress: number;
  readonly completed: boolean;
  readonly total_work_seconds: number;
  readonly daily_work_seconds: number;
  readonly daily_date: CalendarDate;
};

/**
 * A record as read back from storage: any field may be missing or null
 * and is only trusted after normalization.
 */
export type RawTaskRecord = {
  readonly [K in keyof TaskRecord]?: TaskRecord[K] | null;
};

/**
 * Factory function to create the state of a new task with defaults.
 */
export function createTaskState(params: {
  readonly title: string;
  readonly memo?: string;
  readonly dueDate: CalendarDate;
  readonly today: CalendarDate;
}): TaskState {
  return {
    title: params.title.trim(),
    memo: (params.memo ?? "").trim(),
    dueDate: params.dueDate,
    progress: 0,
    isCompleted: false,
    totalWorkSeconds: 0,
    dailyWorkSeconds: 0,
    dailyDate: params.today,
    tracking: IDLE,
  };
}

/**
 * Convert a RawTaskRecord (storage format) to a TaskState (domain format).
 * Missing values take their defaults; the result still needs normalizing.
 */
export function taskStateFromRecord(
  record: RawTaskRecord,
  today: CalendarDate,
): TaskState {
  return {
    title: record.title ?? "",
    memo: record.memo ?? "",
    dueDate: readDate(record.due_date, today),
    progress: record.progress ?? 0,
    isCompleted: record.completed ?? false,
    totalWorkSeconds: record.total_work_seconds ?? 0,
    dailyWorkSeconds: record.daily_work_seconds ?? 0,
    dailyDate: readDate(record.daily_date, today),
    tracking: IDLE,
  };
}

/**
 * Convert a TaskState (domain format) to a TaskRecord (storage format).
 * Stored counters only: a running session is not part of the record.
 */
export function taskStateToRecord(id: string, state: TaskState): TaskRecord {
  return {
    id,
    title: state.title,
    memo: state.memo,
    due_date: state.dueDate,
    progress: state.progress,
    completed: state.isCompleted,
    total_work_seconds: state.totalWorkSeconds,
    daily_work_seconds: state.dailyWorkSeconds,
    daily_date: state.dailyDate,
  };
}

function readDate(
  value: string | null | undefined,
  fallback: CalendarDate,
): CalendarDate {
  if (!value) return fallback;
  return calendarDatePrefix(value) ?? fallback;
}
