/**
 * Snapshot codec: the task set to and from its JSON representation.
 *
 * Format (version 1):
 *
 *   { "version": 1, "tasks": [ { "id": "...", "title": "...", ... } ] }
 *
 * Active records come first in their collection order, then completed
 * records. A bare array of records (no envelope) is also accepted on read.
 *
 * Only the structure is checked here: a value of the wrong JSON type fails
 * the whole snapshot, while missing fields, nulls, out-of-range numbers and
 * stale dates are left for normalization. Unknown keys are dropped.
 */

import { z } from "zod/mini";
import { TkError } from "../../domain/entities/errors.ts";
import type {
  RawTaskRecord,
  TaskRecord,
} from "../../domain/entities/task-state.ts";

export const SNAPSHOT_VERSION = 1;

// ============================================================================
// Schemas
// ============================================================================

const TaskRecordSchema = z.object({
  id: z.optional(z.nullable(z.string())),
  title: z.optional(z.nullable(z.string())),
  memo: z.optional(z.nullable(z.string())),
  due_date: z.optional(z.nullable(z.string())),
  progress: z.optional(z.nullable(z.number())),
  completed: z.optional(z.nullable(z.boolean())),
  total_work_seconds: z.optional(z.nullable(z.number())),
  daily_work_seconds: z.optional(z.nullable(z.number())),
  daily_date: z.optional(z.nullable(z.string())),
});

const SnapshotSchema = z.union([
  z.object({
    version: z.number(),
    tasks: z.array(TaskRecordSchema),
  }),
  z.array(TaskRecordSchema),
]);

// ============================================================================
// Codec
// ============================================================================

export function serializeSnapshot(
  active: readonly TaskRecord[],
  completed: readonly TaskRecord[],
): string {
  return JSON.stringify(
    { version: SNAPSHOT_VERSION, tasks: [...active, ...completed] },
    null,
    2,
  );
}

/**
 * Parse snapshot text into records, in stored order.
 * Throws `format_error` when the text is not a snapshot.
 */
export function deserializeSnapshot(content: string): RawTaskRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new TkError("format_error", `Malformed task snapshot: ${reason}`);
  }

  const result = SnapshotSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0
      ? ` at ${issue.path.map(String).join(".")}`
      : "";
    throw new TkError(
      "format_error",
      `Invalid task snapshot${where}: ${issue?.message ?? "unexpected structure"}`,
    );
  }

  const snapshot = result.data;
  if (Array.isArray(snapshot)) {
    return snapshot;
  }

  if (snapshot.version > SNAPSHOT_VERSION) {
    throw new TkError(
      "format_error",
      `Unsupported task snapshot version: ${snapshot.version}`,
    );
  }
  return snapshot.tasks;
}
