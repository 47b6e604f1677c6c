import { ConfigError } from "@ctxask/shared";

export type FlagValue = string | boolean | string[];

export interface ArgSpec {
  /** Short or alternate names mapped to their canonical long name. */
  aliases?: Record<string, string>;
  booleans?: string[];
  /** Flags that collect every following value up to the next flag. */
  lists?: string[];
}

export interface ParsedArgs {
  flags: Record<string, FlagValue>;
  positionals: string[];
}

const isFlagToken = (token: string): boolean => token.startsWith("-") && !/^-\d/.test(token) && token !== "-";

export const parseArgs = (argv: string[], spec: ArgSpec = {}): ParsedArgs => {
  const aliases = spec.aliases ?? {};
  const booleans = new Set(spec.booleans ?? []);
  const lists = new Set(spec.lists ?? []);
  const flags: Record<string, FlagValue> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!isFlagToken(arg)) {
      positionals.push(arg);
      continue;
    }

    const stripped = arg.replace(/^--?/, "");
    const eq = arg.startsWith("--") ? stripped.indexOf("=") : -1;
    const rawKey = eq >= 0 ? stripped.slice(0, eq) : stripped;
    const key = aliases[rawKey] ?? rawKey;
    const inline = eq >= 0 ? stripped.slice(eq + 1) : undefined;

    if (booleans.has(key)) {
      flags[key] = inline === undefined ? true : !["false", "0", "no"].includes(inline.toLowerCase());
      continue;
    }

    if (lists.has(key)) {
      const values: string[] = [];
      if (inline !== undefined) values.push(inline);
      while (inline === undefined && i + 1 < argv.length && !isFlagToken(argv[i + 1] ?? "")) {
        values.push(argv[i + 1] ?? "");
        i += 1;
      }
      const existing = flags[key];
      flags[key] = Array.isArray(existing) ? [...existing, ...values] : values;
      continue;
    }

    if (inline !== undefined) {
      flags[key] = inline;
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !isFlagToken(next)) {
      flags[key] = next;
      i += 1;
    } else {
      flags[key] = true;
    }
  }
  return { flags, positionals };
};

export const readString = (flags: Record<string, FlagValue>, key: string, command: string): string | undefined => {
  const value = flags[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${command}: missing value for --${key}`);
  }
  return value;
};

export const readNumber = (flags: Record<string, FlagValue>, key: string, command: string): number | undefined => {
  const raw = readString(flags, key, command);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${command}: --${key} expects a number, got ${raw}`);
  }
  return parsed;
};

export const readInteger = (flags: Record<string, FlagValue>, key: string, command: string): number | undefined => {
  const parsed = readNumber(flags, key, command);
  if (parsed !== undefined && !Number.isInteger(parsed)) {
    throw new ConfigError(`${command}: --${key} expects an integer, got ${parsed}`);
  }
  return parsed;
};

export const readList = (flags: Record<string, FlagValue>, key: string): string[] => {
  const value = flags[key];
  if (!value || typeof value === "boolean") return [];
  return Array.isArray(value) ? value : [value];
};

export const readBoolean = (flags: Record<string, FlagValue>, key: string): boolean => flags[key] === true;
