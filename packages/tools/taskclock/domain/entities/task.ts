// Task entity - one unit of work with progress and time tracking

import type { CalendarDate } from "./calendar.ts";
import { isCalendarDate } from "./calendar.ts";
import { TkError } from "./errors.ts";
import {
  applyCompleted,
  applyProgress,
  dailyElapsedSeconds,
  normalizeTaskState,
  startTracking,
  stopTracking,
  totalElapsedSeconds,
} from "./task-helpers.ts";
import type { TaskField, TaskState } from "./task-state.ts";
import { TASK_FIELDS } from "./task-state.ts";

/**
 * Raised once per mutation, listing every field whose value changed.
 */
export type TaskChange = {
  readonly task: Task;
  readonly fields: readonly TaskField[];
};

export type TaskListener = (change: TaskChange) => void;

/**
 * Mutable task with a stable id.
 *
 * Every mutation goes through one of the pure transitions in
 * task-helpers.ts; the entity only stores the result and signals the
 * fields that changed. Operations that depend on the clock take `now`.
 */
export class Task {
  private current: TaskState;
  private readonly listeners = new Set<TaskListener>();

  constructor(
    public readonly id: string,
    state: TaskState,
  ) {
    this.current = state;
  }

  get state(): TaskState {
    return this.current;
  }

  get title(): string {
    return this.current.title;
  }

  get memo(): string {
    return this.current.memo;
  }

  get dueDate(): CalendarDate {
    return this.current.dueDate;
  }

  get progress(): number {
    return this.current.progress;
  }

  get isCompleted(): boolean {
    return this.current.isCompleted;
  }

  get isTracking(): boolean {
    return this.current.tracking.kind === "tracking";
  }

  /** Stored total, without the open session. */
  get totalWorkSeconds(): number {
    return this.current.totalWorkSeconds;
  }

  /** Stored daily counter, without the open session. */
  get dailyWorkSeconds(): number {
    return this.current.dailyWorkSeconds;
  }

  get dailyDate(): CalendarDate {
    return this.current.dailyDate;
  }

  // --- Field edits ---

  setTitle(title: string): void {
    const trimmed = title.trim();
    if (trimmed.length === 0) {
      throw new TkError("invalid_args", "Task title cannot be empty");
    }
    this.commit({ ...this.current, title: trimmed });
  }

  setMemo(memo: string): void {
    this.commit({ ...this.current, memo: memo.trim() });
  }

  setDueDate(dueDate: string): void {
    if (!isCalendarDate(dueDate)) {
      throw new TkError(
        "invalid_args",
        `Invalid due date '${dueDate}' (expected YYYY-MM-DD)`,
      );
    }
    this.commit({ ...this.current, dueDate });
  }

  // --- Progress / completion ---

  setProgress(value: number, now: Date): void {
    this.commit(applyProgress(this.current, value, now));
  }

  setCompleted(completed: boolean, now: Date): void {
    if (completed === this.current.isCompleted) {
      return;
    }
    this.commit(applyCompleted(this.current, completed, now));
  }

  // --- Tracking ---

  startTracking(now: Date): void {
    this.commit(startTracking(this.current, now));
  }

  stopTracking(now: Date): void {
    this.commit(stopTracking(this.current, now));
  }

  totalElapsedSeconds(now: Date): number {
    return totalElapsedSeconds(this.current, now);
  }

  dailyElapsedSeconds(now: Date): number {
    return dailyElapsedSeconds(this.current, now);
  }

  normalize(now: Date): void {
    this.commit(normalizeTaskState(this.current, now));
  }

  // --- Change signal ---

  /**
   * Register a listener for state changes. Returns the unsubscribe function.
   */
  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(next: TaskState): void {
    const previous = this.current;
    const fields = TASK_FIELDS.filter((field) =>
      !sameValue(previous[field], next[field])
    );
    if (fields.length === 0) {
      return;
    }

    this.current = next;
    const change: TaskChange = { task: this, fields };
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }
}

function sameValue(a: TaskState[TaskField], b: TaskState[TaskField]): boolean {
  if (typeof a === "object" && typeof b === "object") {
    if (a.kind === "tracking" && b.kind === "tracking") {
      return a.since === b.since;
    }
    return a.kind === b.kind;
  }
  return a === b;
}
