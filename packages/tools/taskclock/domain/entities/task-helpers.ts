// Task helper functions - pure state transitions and id handling

import { randomUUID } from "node:crypto";
import { startOfDay, toCalendarDate } from "./calendar.ts";
import { TkError } from "./errors.ts";
import type { TaskState } from "./task-state.ts";
import {
  IDLE,
  RESTORED_PROGRESS,
  UNTITLED_TASK_TITLE,
} from "./task-state.ts";

// ============================================================================
// Clamping
// ============================================================================

export function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function clampSeconds(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.floor(value));
}

/**
 * Round to the nearest integer, ties to the even neighbour (0.5 -> 0,
 * 1.5 -> 2, 2.5 -> 2).
 */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

// ============================================================================
// Progress / completion coupling
//
// Evaluation order is fixed: clamp, derive the sibling field, then apply the
// side effect (stop tracking on completion).
// ============================================================================

export function applyProgress(
  state: TaskState,
  value: number,
  now: Date,
): TaskState {
  const progress = clampProgress(value);
  if (progress === 100) {
    return stopTracking({ ...state, progress, isCompleted: true }, now);
  }
  return { ...state, progress, isCompleted: false };
}

export function applyCompleted(
  state: TaskState,
  completed: boolean,
  now: Date,
): TaskState {
  if (completed) {
    return stopTracking(
      { ...state, progress: 100, isCompleted: true },
      now,
    );
  }
  return {
    ...state,
    isCompleted: false,
    progress: state.progress >= 100 ? RESTORED_PROGRESS : state.progress,
  };
}

// ============================================================================
// Time tracking
// ============================================================================

/**
 * Reset the daily counter when `now` falls on another day than dailyDate.
 */
export function rollDailyDate(state: TaskState, now: Date): TaskState {
  const today = toCalendarDate(now);
  if (state.dailyDate === today) {
    return state;
  }
  return { ...state, dailyDate: today, dailyWorkSeconds: 0 };
}

/**
 * Open a tracking session at `now`.
 * No-op while a session is open or once the task is completed.
 */
export function startTracking(state: TaskState, now: Date): TaskState {
  if (state.tracking.kind === "tracking" || state.isCompleted) {
    return state;
  }
  return {
    ...rollDailyDate(state, now),
    tracking: { kind: "tracking", since: now.getTime() },
  };
}

/**
 * Close the open session and fold its duration into the counters.
 * Only the part of the session after local midnight counts toward today.
 */
export function stopTracking(state: TaskState, now: Date): TaskState {
  if (state.tracking.kind !== "tracking") {
    return state;
  }
  const rolled = rollDailyDate(state, now);
  return {
    ...rolled,
    totalWorkSeconds: totalElapsedSeconds(rolled, now),
    dailyWorkSeconds: dailyElapsedSeconds(rolled, now),
    tracking: IDLE,
  };
}

/**
 * Total tracked time including the open session. Never mutates.
 */
export function totalElapsedSeconds(state: TaskState, now: Date): number {
  if (state.tracking.kind !== "tracking") {
    return state.totalWorkSeconds;
  }
  return state.totalWorkSeconds +
    elapsedSeconds(state.tracking.since, now.getTime());
}

/**
 * Time tracked today including the open session. Never mutates.
 */
export function dailyElapsedSeconds(state: TaskState, now: Date): number {
  const base = state.dailyDate === toCalendarDate(now)
    ? state.dailyWorkSeconds
    : 0;
  if (state.tracking.kind !== "tracking") {
    return base;
  }
  const dayStart = startOfDay(now).getTime();
  const from = Math.max(state.tracking.since, dayStart);
  return base + elapsedSeconds(from, now.getTime());
}

function elapsedSeconds(fromMs: number, toMs: number): number {
  return Math.max(0, Math.floor((toMs - fromMs) / 1000));
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Repair a state read from storage. Idempotent.
 *
 * Progress wins over a contradicting completion flag. Tracking is dropped
 * and a daily counter from another day is reset.
 */
export function normalizeTaskState(state: TaskState, now: Date): TaskState {
  const title = state.title.trim();
  const progress = clampProgress(state.progress);
  const today = toCalendarDate(now);
  return {
    title: title.length > 0 ? title : UNTITLED_TASK_TITLE,
    memo: state.memo.trim(),
    dueDate: state.dueDate,
    progress,
    isCompleted: progress === 100,
    totalWorkSeconds: clampSeconds(state.totalWorkSeconds),
    dailyWorkSeconds: state.dailyDate === today
      ? clampSeconds(state.dailyWorkSeconds)
      : 0,
    dailyDate: today,
    tracking: IDLE,
  };
}

// ============================================================================
// Task ids
// ============================================================================

/**
 * Convert a UUID to a base36 task ID (25 characters).
 */
function uuidToBase36(uuid: string): string {
  const hex = uuid.replace(/-/g, "");
  const base36Chars = "0123456789abcdefghijklmnopqrstuvwxyz";
  let result = "";
  let n = BigInt("0x" + hex);

  while (n > 0n) {
    result = base36Chars[Number(n % 36n)] + result;
    n = n / 36n;
  }

  return result.padStart(25, "0");
}

/**
 * Generate a new task ID from a random (or given) UUID.
 */
export function generateTaskId(uid?: string): string {
  return uuidToBase36(uid ?? randomUUID());
}

/**
 * Get the shortest unambiguous prefix for a task ID.
 * Minimum 5 characters, plus 1 character margin for safety.
 */
export function getShortId(taskId: string, allIds: readonly string[]): string {
  const minLen = 5;
  let len = minLen;

  while (len < taskId.length) {
    const prefix = taskId.slice(0, len).toLowerCase();
    const conflicts = allIds.filter(
      (other) => other !== taskId && other.toLowerCase().startsWith(prefix),
    );

    if (conflicts.length === 0) {
      return taskId.slice(0, Math.min(len + 1, taskId.length));
    }
    len++;
  }

  return taskId;
}

/**
 * Resolve an ID prefix to a full task ID.
 * Throws if no match or ambiguous.
 */
export function resolveIdPrefix(
  prefix: string,
  allIds: readonly string[],
): string {
  const needle = prefix.trim().toLowerCase();
  if (needle.length === 0) {
    throw new TkError("invalid_args", "Task ID cannot be empty");
  }

  const exact = allIds.find((id) => id.toLowerCase() === needle);
  if (exact) return exact;

  const matches = allIds.filter((id) => id.toLowerCase().startsWith(needle));

  if (matches.length === 0) {
    throw new TkError(
      "task_not_found",
      `No task found matching prefix: ${prefix}`,
    );
  }

  if (matches.length > 1) {
    throw new TkError(
      "ambiguous_task_id",
      `Ambiguous task ID prefix '${prefix}' matches ${matches.length} tasks`,
    );
  }

  return matches[0];
}
