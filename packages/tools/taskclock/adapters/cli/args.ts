// Argument parsing helpers shared by the CLI and the interactive session

import { TkError } from "../../domain/entities/errors.ts";

/**
 * Parse a progress value typed by the user. Out-of-range numbers are kept
 * (the task clamps them); anything that is not a number is rejected.
 */
export function parseProgress(value: string): number {
  const progress = Number(value);
  if (value.trim() === "" || !Number.isFinite(progress)) {
    throw new TkError("invalid_args", `Invalid progress: ${value}`);
  }
  return progress;
}
