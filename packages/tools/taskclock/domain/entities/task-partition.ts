// Task partition - the active / completed split of the task set

import { TkError } from "./errors.ts";
import type { Task, TaskChange } from "./task.ts";
import { resolveIdPrefix, roundHalfToEven } from "./task-helpers.ts";
import { PERSISTED_FIELDS } from "./task-state.ts";

export type TaskSummary = {
  readonly total: number;
  readonly completed: number;
  readonly active: number;
  readonly averageProgress: number; // rounded half to even, 0 when empty
};

export type PartitionListener = () => void;

/**
 * Owns the ordered `active` and `completed` collections.
 *
 * Invariant: every task sits in exactly one collection, the one matching
 * its `isCompleted` flag. Membership is keyed on task id. Tasks are
 * appended when added or moved, never re-sorted.
 *
 * Moves come from two places: the explicit `complete` / `restore` calls,
 * and task change signals reporting a new `isCompleted` value. The
 * `moving` flag keeps the signal raised by an explicit move from being
 * handled a second time.
 */
export class TaskPartition {
  private readonly activeTasks: Task[] = [];
  private readonly completedTasks: Task[] = [];
  private readonly subscriptions = new Map<string, () => void>();
  private readonly listeners = new Set<PartitionListener>();
  private moving = false;
  private silent = false;
  private deferDepth = 0;
  private pendingChange = false;

  get active(): readonly Task[] {
    return [...this.activeTasks];
  }

  get completed(): readonly Task[] {
    return [...this.completedTasks];
  }

  get size(): number {
    return this.activeTasks.length + this.completedTasks.length;
  }

  /** All tasks, active first, each collection in its own order. */
  all(): readonly Task[] {
    return [...this.activeTasks, ...this.completedTasks];
  }

  find(id: string): Task | null {
    return this.all().find((task) => task.id === id) ?? null;
  }

  /**
   * Resolve a (possibly abbreviated) task id.
   */
  resolve(idPrefix: string): Task {
    const ids = this.all().map((task) => task.id);
    const id = resolveIdPrefix(idPrefix, ids);
    const task = this.find(id);
    if (!task) {
      throw new TkError("task_not_found", `Task not found: ${idPrefix}`);
    }
    return task;
  }

  inActive(task: Task): boolean {
    return indexOf(this.activeTasks, task.id) >= 0;
  }

  inCompleted(task: Task): boolean {
    return indexOf(this.completedTasks, task.id) >= 0;
  }

  // --- Mutations ---

  addTask(task: Task): void {
    if (this.subscriptions.has(task.id)) {
      throw new TkError("invalid_args", `Task already present: ${task.id}`);
    }

    if (task.isCompleted) {
      this.completedTasks.push(task);
    } else {
      this.activeTasks.push(task);
    }
    this.subscriptions.set(
      task.id,
      task.subscribe((change) => this.handleTaskChange(change)),
    );
    this.notify();
  }

  /**
   * Move an active task to `completed`. Returns false when the task is not
   * in `active` (already completed, or unknown).
   *
   * Tasks are looked up by id and the stored instance is the one changed,
   * so a stale handle from before a `reset` cannot replace it.
   */
  complete(task: Task, now: Date): boolean {
    const stored = this.find(task.id);
    if (!stored || !this.inActive(stored)) {
      return false;
    }

    this.defer(() => {
      this.moving = true;
      try {
        stored.stopTracking(now);
        stored.setCompleted(true, now);
        this.relocate(stored, this.activeTasks, this.completedTasks);
      } finally {
        this.moving = false;
      }
    });
    return true;
  }

  /**
   * Move a completed task back to `active`; progress 100 drops to 99.
   */
  restore(task: Task, now: Date): boolean {
    const stored = this.find(task.id);
    if (!stored || !this.inCompleted(stored)) {
      return false;
    }

    this.defer(() => {
      this.moving = true;
      try {
        stored.setCompleted(false, now);
        this.relocate(stored, this.completedTasks, this.activeTasks);
      } finally {
        this.moving = false;
      }
    });
    return true;
  }

  /**
   * Stop tracking, remove the task and drop its subscription.
   */
  delete(task: Task, now: Date): boolean {
    const stored = this.find(task.id);
    const unsubscribe = this.subscriptions.get(task.id);
    if (!stored || !unsubscribe) {
      return false;
    }

    this.defer(() => {
      stored.stopTracking(now);
      removeById(this.activeTasks, stored.id);
      removeById(this.completedTasks, stored.id);
      unsubscribe();
      this.subscriptions.delete(stored.id);
      this.pendingChange = true;
    });
    return true;
  }

  /**
   * Stop every open tracking session in one batch.
   * Returns the number of sessions stopped.
   */
  stopAllTracking(now: Date): number {
    const tracking = this.activeTasks.filter((task) => task.isTracking);
    if (tracking.length === 0) {
      return 0;
    }
    this.defer(() => {
      for (const task of tracking) {
        task.stopTracking(now);
      }
    });
    return tracking.length;
  }

  /**
   * Replace the whole task set without raising a change notification.
   * Used when loading a snapshot: nothing needs writing back.
   */
  reset(tasks: readonly Task[]): void {
    this.silent = true;
    try {
      this.detachAll();
      for (const task of tasks) {
        this.addTask(task);
      }
    } finally {
      this.silent = false;
    }
  }

  /**
   * Run `fn` with change notifications held back; a single notification
   * follows the outermost deferral if anything changed.
   */
  defer<T>(fn: () => T): T {
    this.deferDepth++;
    try {
      return fn();
    } finally {
      this.deferDepth--;
      if (this.deferDepth === 0 && this.pendingChange) {
        this.pendingChange = false;
        this.emit();
      }
    }
  }

  // --- Queries ---

  summary(): TaskSummary {
    const tasks = this.all();
    if (tasks.length === 0) {
      return { total: 0, completed: 0, active: 0, averageProgress: 0 };
    }
    const progressSum = tasks.reduce((sum, task) => sum + task.progress, 0);
    return {
      total: tasks.length,
      completed: this.completedTasks.length,
      active: this.activeTasks.length,
      averageProgress: roundHalfToEven(progressSum / tasks.length),
    };
  }

  // --- Change signal ---

  /**
   * Register a listener called after every mutation of persisted state.
   * Returns the unsubscribe function.
   */
  onChange(listener: PartitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private handleTaskChange(change: TaskChange): void {
    const { task, fields } = change;

    this.defer(() => {
      if (fields.includes("isCompleted") && !this.moving) {
        if (task.isCompleted && this.inActive(task)) {
          this.relocate(task, this.activeTasks, this.completedTasks);
        } else if (!task.isCompleted && this.inCompleted(task)) {
          this.relocate(task, this.completedTasks, this.activeTasks);
        }
      }

      if (fields.some((field) => PERSISTED_FIELDS.has(field))) {
        this.notify();
      }
    });
  }

  private relocate(task: Task, from: Task[], to: Task[]): void {
    removeById(from, task.id);
    if (indexOf(to, task.id) < 0) {
      to.push(task);
    }
    this.pendingChange = true;
  }

  private detachAll(): void {
    for (const unsubscribe of this.subscriptions.values()) {
      unsubscribe();
    }
    this.subscriptions.clear();
    this.activeTasks.length = 0;
    this.completedTasks.length = 0;
  }

  private notify(): void {
    if (this.silent) {
      return;
    }
    if (this.deferDepth > 0) {
      this.pendingChange = true;
      return;
    }
    this.emit();
  }

  private emit(): void {
    if (this.silent) {
      return;
    }
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}

function indexOf(tasks: readonly Task[], id: string): number {
  return tasks.findIndex((task) => task.id === id);
}

function removeById(tasks: Task[], id: string): void {
  const index = indexOf(tasks, id);
  if (index >= 0) {
    tasks.splice(index, 1);
  }
}
