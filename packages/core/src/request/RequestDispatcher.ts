import { Logger, ResponseParseError, TransportError } from "@ctxask/shared";
import {
  FetchTransport,
  type HttpTransport,
  type TransportRequest,
  type TransportResponse,
} from "./HttpTransport.js";
import { validateRequest } from "./RequestBuilder.js";
import type { DispatchResult, PromptRequest } from "./RequestTypes.js";

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([500, 502, 503, 504]);

export interface RetryPolicy {
  /** Total attempts, the initial one included. */
  maxAttempts: number;
  /** Delay before the first retry; doubles on each further retry. */
  backoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, backoffMs: 300 };

export interface RequestDispatcherOptions {
  transport?: HttpTransport;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const backoffDelay = (policy: RetryPolicy, retryIndex: number): number =>
  policy.backoffMs * 2 ** retryIndex;

/**
 * Lenient envelope parsing: the body must be JSON, but a missing or
 * non-string `response` field reads as an empty string.
 */
export const parseResponseBody = (body: string): string => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ResponseParseError(body, error);
  }
  if (parsed && typeof parsed === "object" && "response" in parsed && typeof parsed.response === "string") {
    return parsed.response;
  }
  return "";
};

type AttemptOutcome =
  | { kind: "response"; response: TransportResponse }
  | { kind: "network"; error: unknown };

export class RequestDispatcher {
  private transport: HttpTransport;
  private retry: RetryPolicy;
  private timeoutMs?: number;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: RequestDispatcherOptions = {}) {
    this.transport = options.transport ?? new FetchTransport();
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.timeoutMs = options.timeoutMs;
    this.logger = (options.logger ?? new Logger()).child("dispatcher");
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async dispatch(endpoint: string, payload: PromptRequest): Promise<DispatchResult> {
    validateRequest(payload);
    const body = JSON.stringify(payload);
    const headers = { "Content-Type": "application/json" };
    const maxAttempts = Math.max(1, this.retry.maxAttempts);

    const startedAt = this.now();
    let attempt = 0;
    while (true) {
      attempt += 1;
      const outcome = await this.attempt({ url: endpoint, body, headers, timeoutMs: this.timeoutMs });
      const canRetry = attempt < maxAttempts;

      if (outcome.kind === "network") {
        const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
        if (!canRetry) {
          this.logger.error(`Error making POST request: ${reason}`);
          throw new TransportError(`Error making POST request to ${endpoint}: ${reason}`, {
            attempts: attempt,
            cause: outcome.error,
          });
        }
        await this.backoff(attempt, reason);
        continue;
      }

      const { status } = outcome.response;
      if (status >= 200 && status < 300) {
        const elapsedSeconds = (this.now() - startedAt) / 1000;
        const response = parseResponseBody(outcome.response.body);
        return { response, elapsedSeconds, attempts: attempt };
      }
      if (RETRYABLE_STATUSES.has(status) && canRetry) {
        await this.backoff(attempt, `HTTP ${status}`);
        continue;
      }
      this.logger.error(`Error making POST request: HTTP ${status}`);
      this.logger.debug(`Arguments: url=${endpoint}, payload=${body}`);
      throw new TransportError(`HTTP ${status} from ${endpoint}: ${outcome.response.body.slice(0, 200)}`, {
        status,
        attempts: attempt,
      });
    }
  }

  private async attempt(request: TransportRequest): Promise<AttemptOutcome> {
    try {
      return { kind: "response", response: await this.transport.post(request) };
    } catch (error) {
      return { kind: "network", error };
    }
  }

  private async backoff(attempt: number, reason: string): Promise<void> {
    const delay = backoffDelay(this.retry, attempt - 1);
    this.logger.warn(`Attempt ${attempt} failed (${reason}); retrying in ${delay}ms`);
    await this.sleep(delay);
  }
}
