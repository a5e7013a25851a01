// EditTaskUseCase - Direct field edits on a task
// Completion changes made here reach the partition through the task's
// change signal, the same way an edit in a list view would.

import { isCalendarDate } from "../../entities/calendar.ts";
import { TkError } from "../../entities/errors.ts";
import type { StatusOutput } from "../../entities/outputs.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export interface EditTaskInput {
  readonly taskId: string;
  readonly title?: string;
  readonly memo?: string;
  readonly dueDate?: string;
  readonly progress?: number;
  readonly completed?: boolean;
}

export class EditTaskUseCase {
  constructor(
    private readonly partition: TaskPartition,
    private readonly getNow: () => Date = () => new Date(),
  ) {}

  execute(input: EditTaskInput): StatusOutput {
    const { title, memo, dueDate, progress, completed } = input;
    if (
      title === undefined && memo === undefined && dueDate === undefined &&
      progress === undefined && completed === undefined
    ) {
      throw new TkError("invalid_args", "Nothing to update");
    }

    // Validate everything before the first mutation
    if (title !== undefined && title.trim().length === 0) {
      throw new TkError("invalid_args", "Task title cannot be empty");
    }
    if (dueDate !== undefined && !isCalendarDate(dueDate)) {
      throw new TkError(
        "invalid_args",
        `Invalid due date '${dueDate}' (expected YYYY-MM-DD)`,
      );
    }

    const task = this.partition.resolve(input.taskId);
    const before = task.state;
    const now = this.getNow();

    this.partition.defer(() => {
      if (title !== undefined) task.setTitle(title);
      if (memo !== undefined) task.setMemo(memo);
      if (dueDate !== undefined) task.setDueDate(dueDate);
      if (progress !== undefined) task.setProgress(progress, now);
      if (completed !== undefined) task.setCompleted(completed, now);
    });

    return { status: task.state === before ? "task_unchanged" : "task_updated" };
  }
}
