import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * Helpers for the on-disk locations ctxask writes to. Interaction records
 * land in a directory relative to the working directory unless configured.
 */
export class PathHelper {
  static getInteractionsDir(directory = "interactions", cwd: string = process.cwd()): string {
    return path.resolve(cwd, directory);
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }

  static toSafeSegment(value: string): string {
    const safe = value.replace(/[^a-zA-Z0-9._-]+/g, "_");
    return safe.length ? safe : "_";
  }
}
