// UpdateStatusUseCase - Move a task between the active and completed lists

import type { StatusOutput } from "../../entities/outputs.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export type TargetStatus = "completed" | "active";

export interface UpdateStatusInput {
  readonly taskId: string;
  readonly targetStatus: TargetStatus;
}

export class UpdateStatusUseCase {
  constructor(
    private readonly partition: TaskPartition,
    private readonly getNow: () => Date = () => new Date(),
  ) {}

  execute(input: UpdateStatusInput): StatusOutput {
    const task = this.partition.resolve(input.taskId);
    const now = this.getNow();

    switch (input.targetStatus) {
      case "completed":
        return this.partition.complete(task, now)
          ? { status: "task_completed" }
          : { status: "task_already_completed" };
      case "active":
        return this.partition.restore(task, now)
          ? { status: "task_restored" }
          : { status: "task_already_active" };
    }
  }
}
