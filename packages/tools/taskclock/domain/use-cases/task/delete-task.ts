// DeleteTaskUseCase - Remove a task (stops its tracking session first)

import type { StatusOutput } from "../../entities/outputs.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export interface DeleteTaskInput {
  readonly taskId: string;
}

export class DeleteTaskUseCase {
  constructor(
    private readonly partition: TaskPartition,
    private readonly getNow: () => Date = () => new Date(),
  ) {}

  execute(input: DeleteTaskInput): StatusOutput {
    const task = this.partition.resolve(input.taskId);
    this.partition.delete(task, this.getNow());
    return { status: "task_deleted" };
  }
}
