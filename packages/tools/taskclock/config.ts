// Configuration - where the snapshot lives and how often the display ticks

import { homedir } from "node:os";
import { join } from "node:path";

export const APP_DIR_NAME = "taskclock";
export const SNAPSHOT_FILE = "tasks.json";
export const TICK_INTERVAL_MS = 1000;

export type TaskClockConfig = {
  readonly dataDir: string;
  readonly snapshotPath: string;
  readonly tickIntervalMs: number;
};

export interface ConfigOptions {
  readonly dataDir?: string; // --data-dir
}

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Resolve the data directory, first match wins:
 *   1. --data-dir
 *   2. $TASKCLOCK_HOME
 *   3. $XDG_DATA_HOME/taskclock
 *   4. %LOCALAPPDATA%/taskclock
 *   5. ~/.local/share/taskclock
 */
export function resolveConfig(
  options: ConfigOptions = {},
  env: Env = process.env,
  home: string = homedir(),
): TaskClockConfig {
  const dataDir = nonEmpty(options.dataDir) ??
    nonEmpty(env.TASKCLOCK_HOME) ??
    under(nonEmpty(env.XDG_DATA_HOME)) ??
    under(nonEmpty(env.LOCALAPPDATA)) ??
    join(home, ".local", "share", APP_DIR_NAME);

  return {
    dataDir,
    snapshotPath: join(dataDir, SNAPSHOT_FILE),
    tickIntervalMs: TICK_INTERVAL_MS,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function under(base: string | undefined): string | undefined {
  return base === undefined ? undefined : join(base, APP_DIR_NAME);
}
