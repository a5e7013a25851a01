// ListTasksUseCase - Read-only views of the task collections

import type { ListOutput, TaskView } from "../../entities/outputs.ts";
import type { Task } from "../../entities/task.ts";
import { getShortId } from "../../entities/task-helpers.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export type ListFilter = "active" | "completed" | "all";

export interface ListTasksInput {
  readonly filter?: ListFilter; // default: "active"
}

export class ListTasksUseCase {
  constructor(
    private readonly partition: TaskPartition,
    private readonly getNow: () => Date = () => new Date(),
  ) {}

  execute(input: ListTasksInput = {}): ListOutput {
    const filter = input.filter ?? "active";
    const now = this.getNow();
    const allIds = this.partition.all().map((task) => task.id);
    const toView = (task: Task) => taskView(task, allIds, now);

    return {
      active: filter === "completed" ? null : this.partition.active.map(toView),
      completed: filter === "active"
        ? null
        : this.partition.completed.map(toView),
    };
  }
}

/**
 * Build the display view of a task. Elapsed times are computed live and
 * never written back.
 */
export function taskView(
  task: Task,
  allIds: readonly string[],
  now: Date,
): TaskView {
  return {
    id: getShortId(task.id, allIds),
    fullId: task.id,
    title: task.title,
    memo: task.memo,
    dueDate: task.dueDate,
    progress: task.progress,
    completed: task.isCompleted,
    tracking: task.isTracking,
    dailySeconds: task.dailyElapsedSeconds(now),
    totalSeconds: task.totalElapsedSeconds(now),
  };
}
