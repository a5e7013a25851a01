// StopAllTrackingUseCase - Close every open session (before exit or suspend)

import type { StopAllOutput } from "../../entities/outputs.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export class StopAllTrackingUseCase {
  constructor(
    private readonly partition: TaskPartition,
    private readonly getNow: () => Date = () => new Date(),
  ) {}

  execute(): StopAllOutput {
    return { stopped: this.partition.stopAllTracking(this.getNow()) };
  }
}
