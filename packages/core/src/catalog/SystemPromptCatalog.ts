import YAML from "yaml";
import { UnknownCatalogEntryError } from "@ctxask/shared";

export const parseSystemPrompts = (content: string): Record<string, string> => {
  const parsed: unknown = YAML.parse(content);
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("System prompt catalog must be a mapping of name to prompt text");
  }
  const prompts: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`System prompt '${name}' must be a string`);
    }
    prompts[name] = value.trim();
  }
  return prompts;
};

export class SystemPromptCatalog {
  private prompts: Map<string, string>;

  constructor(prompts: Record<string, string> = {}) {
    this.prompts = new Map(Object.entries(prompts));
  }

  get(name: string): string | undefined {
    return this.prompts.get(name);
  }

  require(name: string): string {
    const prompt = this.prompts.get(name);
    if (prompt === undefined) {
      throw new UnknownCatalogEntryError("system prompt", name, this.list());
    }
    return prompt;
  }

  list(): string[] {
    return Array.from(this.prompts.keys()).sort();
  }

  formatList(): string {
    return this.list()
      .map((name) => `- ${name}`)
      .join("\n");
  }
}
