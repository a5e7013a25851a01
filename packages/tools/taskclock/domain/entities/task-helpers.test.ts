import assert from "node:assert/strict";
import { test } from "node:test";
import {
  applyCompleted,
  applyProgress,
  clampProgress,
  dailyElapsedSeconds,
  generateTaskId,
  getShortId,
  normalizeTaskState,
  resolveIdPrefix,
  startTracking,
  stopTracking,
  totalElapsedSeconds,
} from "./task-helpers.ts";
import type { TaskState } from "./task-state.ts";
import { createTaskState } from "./task-state.ts";

const NOON = new Date(2026, 0, 14, 12, 0, 0);

function state(overrides: Partial<TaskState> = {}): TaskState {
  return {
    ...createTaskState({
      title: "Write report",
      dueDate: "2026-01-20",
      today: "2026-01-14",
    }),
    ...overrides,
  };
}

function trackingSince(date: Date): TaskState["tracking"] {
  return { kind: "tracking", since: date.getTime() };
}

// --- Clamping ---

test("clampProgress - rounds and clamps to 0..100", () => {
  assert.equal(clampProgress(150), 100);
  assert.equal(clampProgress(-5), 0);
  assert.equal(clampProgress(42.6), 43);
  assert.equal(clampProgress(Number.NaN), 0);
});

// --- Progress / completion coupling ---

test("applyProgress - 100 completes the task", () => {
  const next = applyProgress(state(), 100, NOON);
  assert.equal(next.progress, 100);
  assert.equal(next.isCompleted, true);
});

test("applyProgress - 100 stops an open session", () => {
  const tracking = state({
    totalWorkSeconds: 40,
    tracking: trackingSince(new Date(NOON.getTime() - 600_000)),
  });
  const next = applyProgress(tracking, 100, NOON);
  assert.deepEqual(next.tracking, { kind: "idle" });
  assert.equal(next.totalWorkSeconds, 640);
  assert.equal(next.dailyWorkSeconds, 600);
});

test("applyProgress - below 100 un-completes the task", () => {
  const next = applyProgress(state({ progress: 100, isCompleted: true }), 40, NOON);
  assert.equal(next.progress, 40);
  assert.equal(next.isCompleted, false);
});

test("applyProgress - out-of-range values are clamped", () => {
  assert.equal(applyProgress(state(), 250, NOON).progress, 100);
  assert.equal(applyProgress(state({ progress: 30 }), -1, NOON).progress, 0);
});

test("applyCompleted - true forces progress to 100", () => {
  const next = applyCompleted(state({ progress: 30 }), true, NOON);
  assert.equal(next.progress, 100);
  assert.equal(next.isCompleted, true);
});

test("applyCompleted - false drops progress 100 to 99", () => {
  const next = applyCompleted(
    state({ progress: 100, isCompleted: true }),
    false,
    NOON,
  );
  assert.equal(next.progress, 99);
  assert.equal(next.isCompleted, false);
});

test("applyCompleted - false keeps lower progress", () => {
  const next = applyCompleted(state({ progress: 30 }), false, NOON);
  assert.equal(next.progress, 30);
});

// --- Tracking ---

test("startTracking - records the start instant", () => {
  const next = startTracking(state(), NOON);
  assert.deepEqual(next.tracking, { kind: "tracking", since: NOON.getTime() });
});

test("startTracking - no-op on a completed task", () => {
  const completed = state({ progress: 100, isCompleted: true });
  assert.equal(startTracking(completed, NOON), completed);
});

test("startTracking - keeps the first start instant", () => {
  const first = startTracking(state(), NOON);
  const second = startTracking(first, new Date(NOON.getTime() + 5_000));
  assert.equal(second, first);
});

test("startTracking - resets a daily counter from another day", () => {
  const next = startTracking(
    state({ dailyDate: "2026-01-13", dailyWorkSeconds: 900 }),
    NOON,
  );
  assert.equal(next.dailyDate, "2026-01-14");
  assert.equal(next.dailyWorkSeconds, 0);
});

test("stopTracking - adds whole elapsed seconds", () => {
  const tracking = state({
    totalWorkSeconds: 10,
    dailyWorkSeconds: 10,
    tracking: trackingSince(new Date(NOON.getTime() - 90_500)),
  });
  const next = stopTracking(tracking, NOON);
  assert.equal(next.totalWorkSeconds, 100);
  assert.equal(next.dailyWorkSeconds, 100);
  assert.deepEqual(next.tracking, { kind: "idle" });
});

test("stopTracking - idle state is returned unchanged", () => {
  const idle = state({ totalWorkSeconds: 10 });
  assert.equal(stopTracking(idle, NOON), idle);
});

test("stopTracking - only the part after midnight counts for the new day", () => {
  const tracking = state({
    dailyDate: "2026-01-14",
    dailyWorkSeconds: 300,
    totalWorkSeconds: 1000,
    tracking: trackingSince(new Date(2026, 0, 14, 23, 59, 0)),
  });
  const next = stopTracking(tracking, new Date(2026, 0, 15, 0, 1, 0));
  assert.equal(next.totalWorkSeconds, 1120);
  assert.equal(next.dailyWorkSeconds, 60);
  assert.equal(next.dailyDate, "2026-01-15");
});

test("elapsed queries - include the open session without mutating", () => {
  const tracking = state({
    totalWorkSeconds: 100,
    dailyWorkSeconds: 20,
    tracking: trackingSince(new Date(NOON.getTime() - 65_000)),
  });
  assert.equal(totalElapsedSeconds(tracking, NOON), 165);
  assert.equal(dailyElapsedSeconds(tracking, NOON), 85);
  assert.equal(tracking.totalWorkSeconds, 100);
  assert.equal(tracking.dailyWorkSeconds, 20);
});

test("dailyElapsedSeconds - stale daily counter reads as zero", () => {
  const stale = state({ dailyDate: "2026-01-10", dailyWorkSeconds: 500 });
  assert.equal(dailyElapsedSeconds(stale, NOON), 0);
});

// --- Normalization ---

test("normalizeTaskState - repairs a stored state", () => {
  const next = normalizeTaskState(
    state({
      title: "   ",
      memo: "  draft  ",
      progress: 100,
      isCompleted: false,
      totalWorkSeconds: -4,
      dailyDate: "2026-01-10",
      dailyWorkSeconds: 500,
      tracking: trackingSince(NOON),
    }),
    NOON,
  );
  assert.deepEqual(next, {
    title: "(untitled)",
    memo: "draft",
    dueDate: "2026-01-20",
    progress: 100,
    isCompleted: true,
    totalWorkSeconds: 0,
    dailyWorkSeconds: 0,
    dailyDate: "2026-01-14",
    tracking: { kind: "idle" },
  });
});

test("normalizeTaskState - progress wins over the completion flag", () => {
  const next = normalizeTaskState(
    state({ progress: 50, isCompleted: true }),
    NOON,
  );
  assert.equal(next.isCompleted, false);
  assert.equal(next.progress, 50);
});

test("normalizeTaskState - is idempotent", () => {
  const once = normalizeTaskState(
    state({ progress: 120, dailyWorkSeconds: 33.7 }),
    NOON,
  );
  assert.deepEqual(normalizeTaskState(once, NOON), once);
});

// --- Task ids ---

test("generateTaskId - 25 base36 characters", () => {
  assert.equal(
    generateTaskId("00000000-0000-0000-0000-000000000000"),
    "0000000000000000000000000",
  );
  assert.match(generateTaskId(), /^[0-9a-z]{25}$/);
});

test("getShortId - shortest unique prefix plus one character", () => {
  const ids = ["abcdef123", "abcxyz999"];
  assert.equal(getShortId("abcdef123", ids), "abcdef");
});

test("getShortId - falls back to the full id", () => {
  const ids = ["abcdefgh1", "abcdefgh2"];
  assert.equal(getShortId("abcdefgh1", ids), "abcdefgh1");
});

test("resolveIdPrefix - resolves a unique prefix", () => {
  const ids = ["abcdef123", "abxyz0000"];
  assert.equal(resolveIdPrefix("ABCDE", ids), "abcdef123");
});

test("resolveIdPrefix - exact match wins over longer ids", () => {
  assert.equal(resolveIdPrefix("abc", ["abc", "abcd"]), "abc");
});

test("resolveIdPrefix - reports unknown, ambiguous and empty prefixes", () => {
  const ids = ["abcdef123", "abcxyz999"];
  assert.throws(() => resolveIdPrefix("zzz", ids), {
    name: "TkError",
    code: "task_not_found",
    message: "No task found matching prefix: zzz",
  });
  assert.throws(() => resolveIdPrefix("abc", ids), {
    name: "TkError",
    code: "ambiguous_task_id",
  });
  assert.throws(() => resolveIdPrefix("  ", ids), {
    name: "TkError",
    code: "invalid_args",
  });
});
