import {
  AskService,
  CatalogRegistry,
  InteractionRecorder,
  PromptAssemblyService,
  RequestDispatcher,
  TiktokenCounter,
  loadConfig,
  type AskResult,
  type AssembledPrompt,
  type ConfigSource,
  type HttpTransport,
} from "@ctxask/core";
import { ConfigError, Logger, type LogSink } from "@ctxask/shared";
import { parseArgs, readBoolean, readInteger, readList, readNumber, readString } from "../../args/parseArgs.js";

export const ASK_USAGE = `Usage: ctxask [ask] [prompt] [options]

Prompt:
  prompt                     Inline prompt text
  -p, --prompt-file <path>   Read the prompt from a file (any supported format)
  -c, --context <paths...>   Files, directories or glob patterns to attach as context

Instructions (pick one):
  -s, --system <name>        Named system prompt (see \`ctxask prompts\`)
  -k, --task <name>          Named task (see \`ctxask tasks\`)

Request:
  -u, --url <url>            Endpoint URL (CTXASK_URL)
  -a, --user <name>          User identifier (CTXASK_USER)
  -m, --model <name>         Model name (see \`ctxask models\`)
  -t, --temperature <n>      Sampling temperature, 0 to 2
  -o, --top-p <n>            Nucleus sampling, 0 to 1
  -x, --max-tokens <n>       Response token limit (default 100000, capped per model)
  -b, --budget <n>           Context token budget (defaults to --max-tokens when context is given)

Output:
  -n, --count-only           Print the prompt token count and exit without sending
      --no-record            Do not save the interaction
      --json                 Emit a JSON document
  -v, --verbose              Debug logging`;

const ASK_ARGS = {
  aliases: {
    p: "prompt-file",
    c: "context",
    s: "system",
    k: "task",
    u: "url",
    a: "user",
    m: "model",
    t: "temperature",
    o: "top-p",
    x: "max-tokens",
    b: "budget",
    n: "count-only",
    v: "verbose",
    h: "help",
  },
  booleans: ["count-only", "no-record", "json", "verbose", "help"],
  lists: ["context"],
};

const PROMPT_PREVIEW_LENGTH = 100;

/** Response limit for the command line; the request is still capped at the model maximum. */
export const CLI_DEFAULT_MAX_TOKENS = 100_000;

export interface ParsedAskArgs {
  prompt?: string;
  promptFile?: string;
  contextPaths: string[];
  system?: string;
  task?: string;
  url?: string;
  user?: string;
  model?: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  budget?: number;
  countOnly: boolean;
  record: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

export const parseAskArgs = (argv: string[]): ParsedAskArgs => {
  const { flags, positionals } = parseArgs(argv, ASK_ARGS);
  const known = new Set<string>([...Object.values(ASK_ARGS.aliases), ...ASK_ARGS.booleans]);
  for (const key of Object.keys(flags)) {
    if (!known.has(key)) {
      throw new ConfigError(`ask: unknown option --${key}`);
    }
  }
  return {
    prompt: positionals.length ? positionals.join(" ") : undefined,
    promptFile: readString(flags, "prompt-file", "ask"),
    contextPaths: readList(flags, "context"),
    system: readString(flags, "system", "ask"),
    task: readString(flags, "task", "ask"),
    url: readString(flags, "url", "ask"),
    user: readString(flags, "user", "ask"),
    model: readString(flags, "model", "ask"),
    temperature: readNumber(flags, "temperature", "ask"),
    topP: readNumber(flags, "top-p", "ask"),
    maxTokens: readInteger(flags, "max-tokens", "ask"),
    budget: readInteger(flags, "budget", "ask"),
    countOnly: readBoolean(flags, "count-only"),
    record: !readBoolean(flags, "no-record"),
    json: readBoolean(flags, "json"),
    verbose: readBoolean(flags, "verbose"),
    help: readBoolean(flags, "help"),
  };
};

const toConfigSource = (args: ParsedAskArgs): ConfigSource => ({
  endpointUrl: args.url,
  user: args.user,
  model: args.model,
  contextBudget: args.budget,
  sampling: { temperature: args.temperature, topP: args.topP, maxTokens: args.maxTokens },
  recording: args.record ? {} : { enabled: false },
});

export const truncatePrompt = (prompt: string, length = PROMPT_PREVIEW_LENGTH): string =>
  prompt.length > length ? `${prompt.slice(0, length)}...` : prompt;

export const formatHeader = (model: string, assembled: AssembledPrompt): string => {
  const lines = [`Model: ${model}`];
  if (assembled.instructionName) lines.push(`System Prompt: ${assembled.instructionName}`);
  if (assembled.promptTokens !== undefined) lines.push(`Tokens: ${assembled.promptTokens}`);
  lines.push(`Prompt: ${truncatePrompt(assembled.userPrompt)}`);
  return lines.join("\n");
};

export interface AskCommandDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  transport?: HttpTransport;
  dataDir?: string;
  logSink?: LogSink;
  sleep?: (ms: number) => Promise<void>;
}

export class AskCommand {
  static async run(argv: string[], deps: AskCommandDeps = {}): Promise<void> {
    const args = parseAskArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(ASK_USAGE);
      return;
    }

    const config = await loadConfig({
      cwd: deps.cwd,
      env: deps.env,
      defaults: { sampling: { maxTokens: CLI_DEFAULT_MAX_TOKENS } },
      cli: toConfigSource(args),
    });
    const logger = new Logger({ level: args.verbose ? "debug" : config.logging.level, sink: deps.logSink });
    const registry = await CatalogRegistry.load({ dataDir: deps.dataDir, logger });
    const model = registry.models.require(config.model);
    const counter = new TiktokenCounter({ encodings: registry.models.encodings(), logger });

    const assembly = new PromptAssemblyService({ registry, counter, model: model.name, logger });
    const assembled = await assembly.assemble({
      prompt: args.prompt,
      promptFile: args.promptFile,
      contextPaths: args.contextPaths,
      systemPromptName: args.system,
      taskName: args.task,
      contextBudget:
        config.contextBudget ?? (args.contextPaths.length ? config.sampling.maxTokens : undefined),
    });

    if (args.countOnly) {
      const count = assembled.promptTokens === undefined ? "unknown" : String(assembled.promptTokens);
      // eslint-disable-next-line no-console
      console.log(
        args.json
          ? JSON.stringify(
              {
                model: model.name,
                promptTokens: assembled.promptTokens ?? null,
                contextTokens: assembled.contextTokens,
                contextFiles: assembled.contextFiles,
              },
              null,
              2,
            )
          : `Prompt tokens: ${count}`,
      );
      return;
    }

    const dispatcher = new RequestDispatcher({
      transport: deps.transport,
      retry: { maxAttempts: config.request.maxAttempts, backoffMs: config.request.backoffMs },
      timeoutMs: config.request.timeoutMs,
      logger,
      sleep: deps.sleep,
    });
    const recorder = new InteractionRecorder({ directory: config.recording.directory, cwd: deps.cwd, logger });
    const service = new AskService({ config, models: registry.models, dispatcher, recorder, logger });
    const result = await service.ask(assembled.prompt, { model: model.name });

    const output = args.json
      ? AskCommand.toJson(model.name, assembled, result)
      : AskCommand.toText(model.name, assembled, result);
    // eslint-disable-next-line no-console
    console.log(output);
  }

  private static toText(model: string, assembled: AssembledPrompt, result: AskResult): string {
    return `${formatHeader(model, assembled)}\n\n${result.response}`;
  }

  private static toJson(model: string, assembled: AssembledPrompt, result: AskResult): string {
    return JSON.stringify(
      {
        model,
        instruction: assembled.instructionName ?? null,
        promptTokens: assembled.promptTokens ?? null,
        contextFiles: assembled.contextFiles,
        warnings: assembled.warnings,
        response: result.response,
        elapsedSeconds: result.elapsedSeconds,
        attempts: result.attempts,
        recordPath: result.recordPath ?? null,
      },
      null,
      2,
    );
  }
}
