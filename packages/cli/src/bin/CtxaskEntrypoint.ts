import { readFileSync } from "node:fs";
import { describeError } from "@ctxask/shared";
import { AskCommand, type AskCommandDeps } from "../commands/ask/AskCommand.js";
import { CatalogCommands, type CatalogKind } from "../commands/catalog/CatalogCommands.js";

export const USAGE =
  "Usage: ctxask <ask|models|prompts|tasks> [...args]\n" +
  "  ctxask \"prompt\" -c src/ docs/*.md     ask is the default command\n" +
  "  ctxask models | prompts [name] | tasks [name]\n" +
  "Run `ctxask ask --help` for the prompt, context and request options.";

const CATALOG_COMMANDS: readonly CatalogKind[] = ["models", "prompts", "tasks"];

const isCatalogKind = (value: string): value is CatalogKind =>
  (CATALOG_COMMANDS as readonly string[]).includes(value);

export const readVersion = (): string => {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`Unable to read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return "dev";
};

export class CtxaskEntrypoint {
  static async run(argv: string[] = process.argv.slice(2), deps: AskCommandDeps = {}): Promise<void> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(readVersion());
      return;
    }
    if (!command || command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    if (isCatalogKind(command)) {
      await CatalogCommands.run(command, rest, deps);
      return;
    }
    if (command === "ask") {
      await AskCommand.run(rest, deps);
      return;
    }
    await AskCommand.run(argv, deps);
  }
}

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    await CtxaskEntrypoint.run(argv);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(describeError(error));
    process.exitCode = 1;
  }
};
