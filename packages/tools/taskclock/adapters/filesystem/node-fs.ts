/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Failures surface as `io_error`.
 *
 * Dependencies: node:fs/promises.
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TkError } from "../../domain/entities/errors.ts";

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new TkError("io_error", `File not found: ${path}`);
      }
      throw new TkError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, "utf8");
    } catch {
      throw new TkError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw new TkError("io_error", `Failed to access: ${path}`);
    }
  }

  async ensureDir(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch {
      throw new TkError("io_error", `Failed to create directory: ${path}`);
    }
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
