import YAML from "yaml";
import { UnknownCatalogEntryError } from "@ctxask/shared";

/** A named bundle of system instruction and default user prompt. */
export interface Task {
  name: string;
  description: string;
  goal: string;
  systemPrompt: string;
  userPrompt: string;
}

const readString = (record: Record<string, unknown>, key: string): string => {
  const value = record[key];
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") {
    throw new Error(`Task field '${key}' must be a string`);
  }
  return value.trim();
};

export const parseTask = (key: string, content: string): Task => {
  const parsed: unknown = YAML.parse(content);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Task '${key}' must be a YAML mapping`);
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  return {
    name: readString(record, "name") || key,
    description: readString(record, "description"),
    goal: readString(record, "goal"),
    systemPrompt: readString(record, "system_prompt"),
    userPrompt: readString(record, "user_prompt"),
  };
};

export class TaskCatalog {
  private tasks: Map<string, Task>;

  constructor(tasks: Record<string, Task> = {}) {
    this.tasks = new Map(Object.entries(tasks));
  }

  get(key: string): Task | undefined {
    return this.tasks.get(key);
  }

  require(key: string): Task {
    const task = this.tasks.get(key);
    if (!task) {
      throw new UnknownCatalogEntryError("task", key, this.list());
    }
    return task;
  }

  list(): string[] {
    return Array.from(this.tasks.keys()).sort();
  }

  formatList(): string {
    return this.list()
      .map((key) => `- ${key}: ${this.tasks.get(key)?.description ?? ""}`)
      .join("\n");
  }
}
