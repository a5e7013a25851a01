// SummarizeTasksUseCase - Aggregate counts and average progress

import type { SummaryOutput } from "../../entities/outputs.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export class SummarizeTasksUseCase {
  constructor(private readonly partition: TaskPartition) {}

  execute(): SummaryOutput {
    return this.partition.summary();
  }
}
