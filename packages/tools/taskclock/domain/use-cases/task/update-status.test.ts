import assert from "node:assert/strict";
import { test } from "node:test";
import { UpdateStatusUseCase } from "./update-status.ts";
import { DeleteTaskUseCase } from "./delete-task.ts";
import { SummarizeTasksUseCase } from "./summarize-tasks.ts";
import { Task } from "../../entities/task.ts";
import { TaskPartition } from "../../entities/task-partition.ts";
import { createTaskState } from "../../entities/task-state.ts";

const NOON = new Date(2026, 0, 14, 12, 0, 0);

function setup() {
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
  return { partition, task };
}

test("UpdateStatusUseCase - completes then reports already completed", () => {
  const { partition, task } = setup();
  const useCase = new UpdateStatusUseCase(partition, () => NOON);

  assert.deepEqual(
    useCase.execute({ taskId: "abcde", targetStatus: "completed" }),
    { status: "task_completed" },
  );
  assert.deepEqual(
    useCase.execute({ taskId: "abcde", targetStatus: "completed" }),
    { status: "task_already_completed" },
  );
  assert.equal(partition.inCompleted(task), true);
  assert.equal(task.progress, 100);
});

test("UpdateStatusUseCase - restores then reports already active", () => {
  const { partition, task } = setup();
  const useCase = new UpdateStatusUseCase(partition, () => NOON);
  partition.complete(task, NOON);

  assert.deepEqual(
    useCase.execute({ taskId: "abcde", targetStatus: "active" }),
    { status: "task_restored" },
  );
  assert.deepEqual(
    useCase.execute({ taskId: "abcde", targetStatus: "active" }),
    { status: "task_already_active" },
  );
  assert.equal(task.progress, 99);
});

test("DeleteTaskUseCase - removes the task", () => {
  const { partition } = setup();
  const useCase = new DeleteTaskUseCase(partition, () => NOON);

  assert.deepEqual(useCase.execute({ taskId: "abcde" }), {
    status: "task_deleted",
  });
  assert.equal(partition.size, 0);
  assert.throws(() => useCase.execute({ taskId: "abcde" }), {
    name: "TkError",
    code: "task_not_found",
  });
});

test("SummarizeTasksUseCase - reports the partition summary", () => {
  const { partition, task } = setup();
  partition.complete(task, NOON);

  assert.deepEqual(new SummarizeTasksUseCase(partition).execute(), {
    total: 1,
    completed: 1,
    active: 0,
    averageProgress: 100,
  });
});
