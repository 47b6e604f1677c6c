import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import { Logger } from "@ctxask/shared";
import type { PipelineWarning } from "./Types.js";

export type PathSpecKind = "pattern" | "directory" | "file" | "missing";

export interface PathResolution {
  spec: string;
  kind: PathSpecKind;
  files: string[];
  warning?: PipelineWarning;
}

export interface PathResolverOptions {
  supportedExtensions: ReadonlySet<string>;
  logger?: Logger;
}

const WILDCARD_PATTERN = /[*?]/;

export const isWildcardSpec = (spec: string): boolean => WILDCARD_PATTERN.test(spec);

const statOrUndefined = async (target: string) => {
  try {
    return await stat(target);
  } catch {
    return undefined;
  }
};

/**
 * Expands path specifications into regular files. Direct file references
 * are always honored; directory walks keep only allow-listed extensions.
 */
export class PathResolver {
  private supportedExtensions: string[];
  private logger: Logger;

  constructor(options: PathResolverOptions) {
    this.supportedExtensions = Array.from(options.supportedExtensions, (ext) => ext.toLowerCase());
    this.logger = (options.logger ?? new Logger()).child("resolver");
  }

  isSupported(fileName: string): boolean {
    const lower = fileName.toLowerCase();
    return this.supportedExtensions.some((extension) => lower.endsWith(extension));
  }

  async resolve(spec: string): Promise<PathResolution> {
    if (isWildcardSpec(spec)) {
      const files = await this.expandPattern(spec);
      if (!files.length) {
        return this.warn(spec, "pattern", `No files match pattern '${spec}'`);
      }
      return { spec, kind: "pattern", files };
    }

    const stats = await statOrUndefined(spec);
    if (stats?.isDirectory()) {
      return { spec, kind: "directory", files: await this.walk(spec) };
    }
    if (stats?.isFile()) {
      return { spec, kind: "file", files: [spec] };
    }
    return this.warn(spec, "missing", `Path '${spec}' does not exist`);
  }

  async resolveAll(specs: string[]): Promise<PathResolution[]> {
    const resolutions: PathResolution[] = [];
    for (const spec of specs) {
      resolutions.push(await this.resolve(spec));
    }
    return resolutions;
  }

  private warn(spec: string, kind: PathSpecKind, message: string): PathResolution {
    this.logger.warn(message);
    return { spec, kind, files: [], warning: { kind: "path_resolution", path: spec, message } };
  }

  private async expandPattern(pattern: string): Promise<string[]> {
    const matches = await glob(pattern, { nodir: true });
    return Array.from(new Set(matches)).sort();
  }

  // Top-down: a directory's own files before its subdirectories, names sorted.
  private async walk(root: string): Promise<string[]> {
    const files: string[] = [];
    let entries: Dirent[];
    try {
      entries = await readdir(root, { withFileTypes: true });
    } catch (error) {
      this.logger.warn(`Cannot read directory '${root}': ${error instanceof Error ? error.message : String(error)}`);
      return files;
    }
    entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

    const subdirectories: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(root, entry.name);
      if (entry.isDirectory()) {
        subdirectories.push(entryPath);
        continue;
      }
      if (!this.isSupported(entry.name)) continue;
      if (entry.isFile()) {
        files.push(entryPath);
      } else if (entry.isSymbolicLink() && (await statOrUndefined(entryPath))?.isFile()) {
        files.push(entryPath);
      }
    }
    for (const directory of subdirectories) {
      files.push(...(await this.walk(directory)));
    }
    return files;
  }
}
