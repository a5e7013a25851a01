// Command output types - immutable result types for all taskclock commands

import type { CalendarDate } from "./calendar.ts";
import type { TaskSummary } from "./task-partition.ts";

export type AddOutput = {
  readonly id: string; // short ID
};

export type TaskView = {
  readonly id: string; // short ID
  readonly fullId: string;
  readonly title: string;
  readonly memo: string;
  readonly dueDate: CalendarDate;
  readonly progress: number;
  readonly completed: boolean;
  readonly tracking: boolean;
  readonly dailySeconds: number; // live, includes the open session
  readonly totalSeconds: number; // live, includes the open session
};

export type ListOutput = {
  readonly active: readonly TaskView[] | null; // null when not requested
  readonly completed: readonly TaskView[] | null;
};

export type StatusOutput = {
  readonly status:
    | "task_updated"
    | "task_unchanged"
    | "task_completed"
    | "task_already_completed"
    | "task_restored"
    | "task_already_active"
    | "task_deleted"
    | "tracking_started"
    | "tracking_already_started"
    | "tracking_stopped"
    | "tracking_not_started";
};

export type SummaryOutput = TaskSummary;

export type LoadOutput = {
  readonly loaded: number;
  readonly active: number;
  readonly completed: number;
};

export type StopAllOutput = {
  readonly stopped: number;
};
