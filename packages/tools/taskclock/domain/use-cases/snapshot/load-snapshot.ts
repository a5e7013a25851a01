// LoadSnapshotUseCase - Rebuild the partition from the stored snapshot
//
// Records are normalized before anything touches the partition, so a
// failed load (format_error / io_error) leaves the current tasks in place.

import { toCalendarDate } from "../../entities/calendar.ts";
import type { LoadOutput } from "../../entities/outputs.ts";
import { Task } from "../../entities/task.ts";
import {
  generateTaskId,
  normalizeTaskState,
} from "../../entities/task-helpers.ts";
import type { TaskPartition } from "../../entities/task-partition.ts";
import { taskStateFromRecord } from "../../entities/task-state.ts";
import type { TaskRepository } from "../../ports/task-repository.ts";

export interface LoadSnapshotDeps {
  readonly partition: TaskPartition;
  readonly taskRepo: TaskRepository;
  readonly generateId?: () => string;
  readonly getNow?: () => Date;
}

export class LoadSnapshotUseCase {
  constructor(private readonly deps: LoadSnapshotDeps) {}

  async execute(): Promise<LoadOutput> {
    const records = await this.deps.taskRepo.load();

    const generateId = this.deps.generateId ?? (() => generateTaskId());
    const now = this.deps.getNow?.() ?? new Date();
    const today = toCalendarDate(now);
    const seen = new Set<string>();

    const tasks = records.map((record) => {
      let id = record.id?.trim() ?? "";
      if (id.length === 0 || seen.has(id)) {
        id = generateId();
      }
      seen.add(id);
      const state = taskStateFromRecord(record, today);
      return new Task(id, normalizeTaskState(state, now));
    });

    this.deps.partition.reset(tasks);

    const completed = tasks.filter((task) => task.isCompleted).length;
    return {
      loaded: tasks.length,
      active: tasks.length - completed,
      completed,
    };
  }
}
