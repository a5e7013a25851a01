// TrackTimeUseCase - Start or stop the tracking session of a task

import { TkError } from "../../entities/errors.ts";
import type { StatusOutput } from "../../entities/outputs.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";

export type TrackAction = "start" | "stop";

export interface TrackTimeInput {
  readonly taskId: string;
  readonly action: TrackAction;
}

export class TrackTimeUseCase {
  constructor(
    private readonly partition: TaskPartition,
    private readonly getNow: () => Date = () => new Date(),
  ) {}

  execute(input: TrackTimeInput): StatusOutput {
    const task = this.partition.resolve(input.taskId);
    const now = this.getNow();

    if (input.action === "start") {
      if (task.isCompleted) {
        throw new TkError(
          "invalid_state",
          `Cannot start tracking completed task: ${task.title}`,
        );
      }
      if (task.isTracking) {
        return { status: "tracking_already_started" };
      }
      task.startTracking(now);
      return { status: "tracking_started" };
    }

    if (!task.isTracking) {
      return { status: "tracking_not_started" };
    }
    task.stopTracking(now);
    return { status: "tracking_stopped" };
  }
}
