// Task repository port - persistence interface for the task snapshot

import type { RawTaskRecord, TaskRecord } from "../entities/task-state.ts";

/**
 * Repository for persisting and retrieving the whole task set.
 */
export interface TaskRepository {
  /**
   * Load every stored record, in stored order. Returns an empty list when
   * nothing has been saved yet. Throws `format_error` or `io_error`.
   */
  load(): Promise<readonly RawTaskRecord[]>;

  /** Save the complete task set: active records first, then completed. */
  save(
    active: readonly TaskRecord[],
    completed: readonly TaskRecord[],
  ): Promise<void>;
}
