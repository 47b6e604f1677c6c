import { writeFile } from "node:fs/promises";
import path from "node:path";
import { Logger, PathHelper } from "@ctxask/shared";
import { isStandardRequest, type PromptRequest } from "./RequestTypes.js";

export interface InteractionRecord {
  timestamp: string;
  request: {
    prompt: string;
    model: string;
    parameters: {
      temperature: number | null;
      top_p: number | null;
      max_tokens: number | null;
      max_completion_tokens: number | null;
    };
    system: string;
  };
  response: {
    content: string;
    time_taken: number;
  };
}

export interface InteractionRecorderOptions {
  directory?: string;
  cwd?: string;
  logger?: Logger;
  now?: () => Date;
}

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatFileTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

const parametersOf = (request: PromptRequest): InteractionRecord["request"]["parameters"] =>
  isStandardRequest(request)
    ? {
        temperature: request.temperature,
        top_p: request.top_p,
        max_tokens: request.max_tokens,
        max_completion_tokens: null,
      }
    : {
        temperature: null,
        top_p: null,
        max_tokens: null,
        max_completion_tokens: request.max_completion_tokens,
      };

export const buildInteractionRecord = (
  request: PromptRequest,
  response: string,
  elapsedSeconds: number,
  timestamp: Date,
): InteractionRecord => ({
  timestamp: timestamp.toISOString(),
  request: {
    prompt: request.prompt[0],
    model: request.model,
    parameters: parametersOf(request),
    system: request.system,
  },
  response: {
    content: response,
    time_taken: elapsedSeconds,
  },
});

/**
 * Writes one JSON file per successful call, named `{user}_{model}_{timestamp}.json`.
 * Best effort: a failed write is logged and reported as `undefined`.
 */
export class InteractionRecorder {
  readonly directory: string;
  private logger: Logger;
  private now: () => Date;

  constructor(options: InteractionRecorderOptions = {}) {
    this.directory = PathHelper.getInteractionsDir(options.directory, options.cwd);
    this.logger = (options.logger ?? new Logger()).child("recorder");
    this.now = options.now ?? (() => new Date());
  }

  filenameFor(request: PromptRequest, at: Date): string {
    const user = PathHelper.toSafeSegment(request.user);
    const model = PathHelper.toSafeSegment(request.model);
    return `${user}_${model}_${formatFileTimestamp(at)}.json`;
  }

  async record(request: PromptRequest, response: string, elapsedSeconds: number): Promise<string | undefined> {
    const at = this.now();
    const filePath = path.join(this.directory, this.filenameFor(request, at));
    const record = buildInteractionRecord(request, response, elapsedSeconds, at);
    try {
      await PathHelper.ensureDir(this.directory);
      await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, { encoding: "utf8", flag: "wx" });
      this.logger.info(`Interaction saved to: ${filePath}`);
      return filePath;
    } catch (error) {
      this.logger.error(`Error saving interaction: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
