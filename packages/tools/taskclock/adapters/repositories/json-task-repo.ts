/**
 * Adapter: JsonTaskRepository
 *
 * Implements the TaskRepository port with a single JSON snapshot file.
 * A missing file is an empty task set; a parent directory is created on
 * first save.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - snapshot-codec for the file format
 */

import { dirname } from "node:path";
import type {
  RawTaskRecord,
  TaskRecord,
} from "../../domain/entities/task-state.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { TaskRepository } from "../../domain/ports/task-repository.ts";
import { deserializeSnapshot, serializeSnapshot } from "./snapshot-codec.ts";

export class JsonTaskRepository implements TaskRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly snapshotPath: string,
  ) {}

  async load(): Promise<readonly RawTaskRecord[]> {
    if (!(await this.fs.exists(this.snapshotPath))) {
      return [];
    }

    const content = await this.fs.readFile(this.snapshotPath);
    return deserializeSnapshot(content);
  }

  async save(
    active: readonly TaskRecord[],
    completed: readonly TaskRecord[],
  ): Promise<void> {
    await this.fs.ensureDir(dirname(this.snapshotPath));
    await this.fs.writeFile(
      this.snapshotPath,
      serializeSnapshot(active, completed),
    );
  }
}
