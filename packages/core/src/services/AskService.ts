import { Logger, MissingConfigError } from "@ctxask/shared";
import type { CtxaskConfig } from "../config/Config.js";
import type { ModelCatalog } from "../models/ModelCatalog.js";
import { InteractionRecorder } from "../request/InteractionRecorder.js";
import { buildPromptRequest, resolveSampling } from "../request/RequestBuilder.js";
import { RequestDispatcher } from "../request/RequestDispatcher.js";
import type { PromptRequest, SamplingParameters } from "../request/RequestTypes.js";

export interface AskOptions {
  model?: string;
  system?: string;
  sampling?: Partial<SamplingParameters>;
  endpointUrl?: string;
  user?: string;
  record?: boolean;
}

export interface AskResult {
  response: string;
  elapsedSeconds: number;
  attempts: number;
  request: PromptRequest;
  recordPath?: string;
}

export interface AskServiceDeps {
  config: CtxaskConfig;
  models: ModelCatalog;
  dispatcher?: RequestDispatcher;
  recorder?: InteractionRecorder;
  logger?: Logger;
}

/**
 * Sends one composed prompt. Model lookup and parameter checks run before
 * any network activity; recording happens only after a successful response.
 */
export class AskService {
  private config: CtxaskConfig;
  private models: ModelCatalog;
  private dispatcher: RequestDispatcher;
  private recorder: InteractionRecorder;
  private logger: Logger;

  constructor(deps: AskServiceDeps) {
    this.config = deps.config;
    this.models = deps.models;
    this.logger = (deps.logger ?? new Logger()).child("ask");
    this.dispatcher =
      deps.dispatcher ??
      new RequestDispatcher({
        retry: { maxAttempts: deps.config.request.maxAttempts, backoffMs: deps.config.request.backoffMs },
        timeoutMs: deps.config.request.timeoutMs,
        logger: deps.logger,
      });
    this.recorder =
      deps.recorder ?? new InteractionRecorder({ directory: deps.config.recording.directory, logger: deps.logger });
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<AskResult> {
    const endpointUrl = options.endpointUrl ?? this.config.endpointUrl;
    const user = options.user ?? this.config.user;
    if (!endpointUrl || !user) {
      const missing = [!endpointUrl ? "endpointUrl" : undefined, !user ? "user" : undefined].filter(
        (field): field is string => field !== undefined,
      );
      throw new MissingConfigError(missing);
    }

    const model = this.models.require(options.model ?? this.config.model);
    const request = buildPromptRequest({
      user,
      model,
      prompt,
      system: options.system,
      sampling: resolveSampling(this.config.sampling, options.sampling),
    });

    const { response, elapsedSeconds, attempts } = await this.dispatcher.dispatch(endpointUrl, request);
    this.logger.info(`Response received in ${elapsedSeconds.toFixed(2)} seconds`);

    let recordPath: string | undefined;
    if (options.record ?? this.config.recording.enabled) {
      recordPath = await this.recorder.record(request, response, elapsedSeconds);
    }
    return { response, elapsedSeconds, attempts, request, recordPath };
  }
}
