import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Logger } from "@ctxask/shared";
import { DEFAULT_MODELS, ModelCatalog, type ModelConfig } from "../models/ModelCatalog.js";
import { SystemPromptCatalog, parseSystemPrompts } from "./SystemPromptCatalog.js";
import { TaskCatalog, parseTask, type Task } from "./TaskCatalog.js";

export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

export interface CatalogRegistryInput {
  models?: readonly ModelConfig[];
  systemPrompts?: Record<string, string>;
  tasks?: Record<string, Task>;
  supportedExtensions?: readonly string[];
}

export interface LoadCatalogOptions {
  dataDir?: string;
  models?: readonly ModelConfig[];
  logger?: Logger;
}

const parseExtensions = (content: string): string[] => {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error("supported-extensions.json must be an array of strings");
  }
  return parsed.map((entry) => {
    if (typeof entry !== "string") {
      throw new Error("supported-extensions.json must be an array of strings");
    }
    return entry.toLowerCase();
  });
};

const loadTasks = async (tasksDir: string, logger: Logger): Promise<Record<string, Task>> => {
  const tasks: Record<string, Task> = {};
  let files: string[];
  try {
    files = (await readdir(tasksDir)).filter((file) => file.endsWith(".yaml")).sort();
  } catch (error) {
    logger.warn(`No task directory at ${tasksDir}: ${error instanceof Error ? error.message : String(error)}`);
    return tasks;
  }
  for (const file of files) {
    const key = path.basename(file, ".yaml");
    try {
      const content = await readFile(path.join(tasksDir, file), "utf8");
      tasks[key] = parseTask(key, content);
    } catch (error) {
      logger.error(`Error loading task '${key}': ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  logger.debug(`Loaded ${Object.keys(tasks).length} tasks from ${tasksDir}`);
  return tasks;
};

/**
 * Process-wide, read-only lookup tables. Built once through `load` at
 * startup; tests construct one directly with the entries they need.
 */
export class CatalogRegistry {
  readonly models: ModelCatalog;
  readonly systemPrompts: SystemPromptCatalog;
  readonly tasks: TaskCatalog;
  readonly supportedExtensions: ReadonlySet<string>;

  constructor(input: CatalogRegistryInput = {}) {
    this.models = new ModelCatalog(input.models ?? DEFAULT_MODELS);
    this.systemPrompts = new SystemPromptCatalog(input.systemPrompts ?? {});
    this.tasks = new TaskCatalog(input.tasks ?? {});
    this.supportedExtensions = new Set(
      (input.supportedExtensions ?? []).map((extension) => extension.toLowerCase()),
    );
  }

  static async load(options: LoadCatalogOptions = {}): Promise<CatalogRegistry> {
    const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    const logger = (options.logger ?? new Logger()).child("catalog");
    const promptsContent = await readFile(path.join(dataDir, "system-prompts.yaml"), "utf8");
    const extensionsContent = await readFile(path.join(dataDir, "supported-extensions.json"), "utf8");
    const tasks = await loadTasks(path.join(dataDir, "tasks"), logger);
    return new CatalogRegistry({
      models: options.models ?? DEFAULT_MODELS,
      systemPrompts: parseSystemPrompts(promptsContent),
      tasks,
      supportedExtensions: parseExtensions(extensionsContent),
    });
  }
}
