import { CatalogRegistry, type Task } from "@ctxask/core";
import { ConfigError, Logger, type LogSink } from "@ctxask/shared";
import { parseArgs, readBoolean } from "../../args/parseArgs.js";

export type CatalogKind = "models" | "prompts" | "tasks";

const CATALOG_ARGS = { aliases: { h: "help" }, booleans: ["json", "help"] };

const usage = (kind: CatalogKind): string =>
  kind === "models"
    ? "Usage: ctxask models [--json]"
    : `Usage: ctxask ${kind} [name] [--json]`;

export interface CatalogCommandDeps {
  dataDir?: string;
  logSink?: LogSink;
}

const formatTask = (task: Task): string =>
  [
    task.name,
    "=".repeat(task.name.length),
    `Description: ${task.description}`,
    `Goal: ${task.goal}`,
    "",
    "System prompt:",
    task.systemPrompt,
    "",
    "Default user prompt:",
    task.userPrompt,
  ].join("\n");

export class CatalogCommands {
  static async run(kind: CatalogKind, argv: string[], deps: CatalogCommandDeps = {}): Promise<void> {
    const { flags, positionals } = parseArgs(argv, CATALOG_ARGS);
    for (const key of Object.keys(flags)) {
      if (!CATALOG_ARGS.booleans.includes(key)) {
        throw new ConfigError(`${kind}: unknown option --${key}`);
      }
    }
    if (readBoolean(flags, "help")) {
      // eslint-disable-next-line no-console
      console.log(usage(kind));
      return;
    }
    const json = readBoolean(flags, "json");
    const [name] = positionals;
    const registry = await CatalogRegistry.load({ dataDir: deps.dataDir, logger: new Logger({ sink: deps.logSink }) });

    let output: string;
    if (kind === "models") {
      output = json
        ? JSON.stringify(registry.models.list().map((model) => registry.models.require(model)), null, 2)
        : registry.models.describe();
    } else if (kind === "prompts") {
      if (name) {
        const text = registry.systemPrompts.require(name);
        output = json ? JSON.stringify({ name, prompt: text }, null, 2) : text;
      } else {
        output = json ? JSON.stringify(registry.systemPrompts.list(), null, 2) : registry.systemPrompts.formatList();
      }
    } else if (name) {
      const task = registry.tasks.require(name);
      output = json ? JSON.stringify(task, null, 2) : formatTask(task);
    } else {
      output = json
        ? JSON.stringify(
            registry.tasks.list().map((key) => ({ name: key, description: registry.tasks.require(key).description })),
            null,
            2,
          )
        : registry.tasks.formatList();
    }
    // eslint-disable-next-line no-console
    console.log(output);
  }
}
