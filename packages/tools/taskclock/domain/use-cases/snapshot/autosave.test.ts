import assert from "node:assert/strict";
import { test } from "node:test";
import { SnapshotAutosave } from "./autosave.ts";
import { TkError } from "../../entities/errors.ts";
import { Task } from "../../entities/task.ts";
import { TaskPartition } from "../../entities/task-partition.ts";
import type { TaskRecord } from "../../entities/task-state.ts";
import { createTaskState } from "../../entities/task-state.ts";
import type { TaskRepository } from "../../ports/task-repository.ts";

const NOON = new Date(2026, 0, 14, 12, 0, 0);

// --- Mock implementations ---

type SavedSnapshot = {
  active: string[];
  completed: string[];
};

function titles(records: readonly TaskRecord[]): string[] {
  return records.map((record) => record.title);
}

function createMockTaskRepo(
  save: (snapshot: SavedSnapshot) => Promise<void> = () => Promise.resolve(),
): TaskRepository & { saved: SavedSnapshot[] } {
  const saved: SavedSnapshot[] = [];
  return {
    saved,
    load() {
      return Promise.resolve([]);
    },
    save(active, completed) {
      const snapshot = { active: titles(active), completed: titles(completed) };
      saved.push(snapshot);
      return save(snapshot);
    },
  };
}

function setup(taskRepo: TaskRepository) {
  const partition = new TaskPartition();
  const task = new Task(
    "abcde11111",
    createTaskState({
      title: "Write report",
      dueDate: "2026-01-20",
      today: "2026-01-14",
    }),
  );
  partition.addTask(task);
  const errors: TkError[] = [];
  const autosave = new SnapshotAutosave(
    partition,
    taskRepo,
    (error) => errors.push(error),
  );
  autosave.attach();
  return { partition, task, autosave, errors };
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

test("SnapshotAutosave - saves after a change", async () => {
  const taskRepo = createMockTaskRepo();
  const { partition, task, autosave } = setup(taskRepo);

  partition.complete(task, NOON);
  await autosave.flush();

  assert.deepEqual(taskRepo.saved, [
    { active: [], completed: ["Write report"] },
  ]);
});

test("SnapshotAutosave - writes run in order with the state of their change", async () => {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = () => resolve();
  });
  let calls = 0;
  const taskRepo = createMockTaskRepo(() =>
    calls++ === 0 ? gate : Promise.resolve()
  );
  const { task, autosave } = setup(taskRepo);

  task.setTitle("Second title");
  task.setTitle("Third title");
  await nextTurn();

  assert.equal(taskRepo.saved.length, 1);

  release();
  await autosave.flush();

  assert.deepEqual(taskRepo.saved, [
    { active: ["Second title"], completed: [] },
    { active: ["Third title"], completed: [] },
  ]);
});

test("SnapshotAutosave - write failures go to onError", async () => {
  const taskRepo = createMockTaskRepo(() =>
    Promise.reject(new TkError("io_error", "Failed to write file: tasks.json"))
  );
  const { task, autosave, errors } = setup(taskRepo);

  task.setMemo("draft");
  await autosave.flush();

  assert.equal(errors.length, 1);
  assert.equal(errors[0].code, "io_error");
  assert.equal(errors[0].message, "Failed to write file: tasks.json");
  assert.equal(task.memo, "draft");
});

test("SnapshotAutosave - foreign errors become io_error", async () => {
  const taskRepo = createMockTaskRepo(() =>
    Promise.reject(new Error("disk full"))
  );
  const { task, autosave, errors } = setup(taskRepo);

  task.setMemo("draft");
  await autosave.flush();

  assert.equal(errors.length, 1);
  assert.equal(errors[0].code, "io_error");
  assert.equal(errors[0].message, "Failed to save tasks: disk full");
});

test("SnapshotAutosave - a failed write does not block later ones", async () => {
  let calls = 0;
  const taskRepo = createMockTaskRepo(() =>
    calls++ === 0
      ? Promise.reject(new TkError("io_error", "Failed to write file: x"))
      : Promise.resolve()
  );
  const { task, autosave, errors } = setup(taskRepo);

  task.setMemo("first");
  task.setMemo("second");
  await autosave.flush();

  assert.equal(errors.length, 1);
  assert.equal(taskRepo.saved.length, 2);
});

test("SnapshotAutosave - attach is idempotent and close detaches", async () => {
  const taskRepo = createMockTaskRepo();
  const { task, autosave } = setup(taskRepo);
  autosave.attach();

  task.setMemo("first");
  await autosave.flush();
  assert.equal(taskRepo.saved.length, 1);

  autosave.close();
  task.setMemo("second");
  await autosave.flush();
  assert.equal(taskRepo.saved.length, 1);
});
