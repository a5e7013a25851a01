/**
 * CLI output formatters for taskclock commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import type {
  AddOutput,
  ListOutput,
  StatusOutput,
  StopAllOutput,
  SummaryOutput,
  TaskView,
  TkError,
} from "../../types.ts";

// ============================================================================
// Durations
// ============================================================================

/**
 * `MM:SS` below one hour, `HH:MM:SS` from one hour on (hours are not capped).
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const mm = String(m).padStart(2, "0");
  const ss = String(s).padStart(2, "0");
  if (h >= 1) {
    return `${String(h).padStart(2, "0")}:${mm}:${ss}`;
  }
  return `${mm}:${ss}`;
}

/**
 * Work time as shown next to a task: "daily (total)".
 */
export function formatWorkTime(
  dailySeconds: number,
  totalSeconds: number,
): string {
  return `${formatDuration(dailySeconds)} (${formatDuration(totalSeconds)})`;
}

// ============================================================================
// Formatters
// ============================================================================

export function formatAdd(output: AddOutput): string {
  return output.id;
}

export function formatStatus(output: StatusOutput): string {
  return output.status.replace(/_/g, " ");
}

export function formatTaskLine(task: TaskView): string {
  const mark = task.completed ? "x" : task.tracking ? "/" : " ";
  const progress = `${task.progress}%`.padStart(4);
  const work = formatWorkTime(task.dailySeconds, task.totalSeconds);
  return `${task.id}  [${mark}] ${progress}  "${task.title}"  due ${task.dueDate}  ${work}`;
}

export function formatList(output: ListOutput): string {
  const { active, completed } = output;

  if (active && completed) {
    if (active.length === 0 && completed.length === 0) {
      return "no tasks";
    }
    return [
      `active (${active.length}):`,
      ...active.map((t) => `  ${formatTaskLine(t)}`),
      `completed (${completed.length}):`,
      ...completed.map((t) => `  ${formatTaskLine(t)}`),
    ].join("\n");
  }

  if (completed) {
    return completed.length === 0
      ? "no completed tasks"
      : completed.map(formatTaskLine).join("\n");
  }

  if (!active || active.length === 0) {
    return "no active tasks";
  }
  return active.map(formatTaskLine).join("\n");
}

export function formatSummary(output: SummaryOutput): string {
  if (output.total === 0) {
    return "no tasks";
  }
  return `${output.averageProgress}% overall (${output.completed}/${output.total} done, ${output.active} remaining)`;
}

export function formatStopAll(output: StopAllOutput): string {
  if (output.stopped === 0) {
    return "no tracking sessions";
  }
  return output.stopped === 1
    ? "stopped 1 tracking session"
    : `stopped ${output.stopped} tracking sessions`;
}

/**
 * Live status for the interactive prompt: one entry per tracking task.
 */
export function formatTracking(tasks: readonly TaskView[]): string {
  return tasks
    .filter((t) => t.tracking)
    .map((t) => `${t.title} ${formatWorkTime(t.dailySeconds, t.totalSeconds)}`)
    .join(" | ");
}

export function formatError(error: TkError): string {
  return `error: ${error.code}\n${error.message}`;
}
