// AddTaskUseCase - Create a new task and place it in its collection

import { isCalendarDate, toCalendarDate } from "../../entities/calendar.ts";
import { TkError } from "../../entities/errors.ts";
import type { AddOutput } from "../../entities/outputs.ts";
import { Task } from "../../entities/task.ts";
import { generateTaskId, getShortId } from "../../entities/task-helpers.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";
import { createTaskState } from "../../entities/task-state.ts";

export interface AddTaskInput {
  readonly title: string;
  readonly memo?: string;
  readonly dueDate?: string; // YYYY-MM-DD, defaults to today
  readonly progress?: number; // clamped to 0..100
}

export interface AddTaskDeps {
  readonly partition: TaskPartition;
  readonly generateId?: () => string;
  readonly getNow?: () => Date;
}

export class AddTaskUseCase {
  constructor(private readonly deps: AddTaskDeps) {}

  execute(input: AddTaskInput): AddOutput {
    const title = input.title.trim();
    if (title.length === 0) {
      throw new TkError("invalid_args", "Task title cannot be empty");
    }
    if (input.dueDate !== undefined && !isCalendarDate(input.dueDate)) {
      throw new TkError(
        "invalid_args",
        `Invalid due date '${input.dueDate}' (expected YYYY-MM-DD)`,
      );
    }

    const generateId = this.deps.generateId ?? (() => generateTaskId());
    const now = this.deps.getNow?.() ?? new Date();
    const today = toCalendarDate(now);

    const task = new Task(
      generateId(),
      createTaskState({
        title,
        memo: input.memo,
        dueDate: input.dueDate ?? today,
        today,
      }),
    );
    if (input.progress !== undefined) {
      task.setProgress(input.progress, now);
    }

    this.deps.partition.addTask(task);

    const allIds = this.deps.partition.all().map((t) => t.id);
    return { id: getShortId(task.id, allIds) };
  }
}
