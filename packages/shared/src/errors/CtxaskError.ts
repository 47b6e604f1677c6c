export type CtxaskErrorCode =
  | "token_budget_exceeded"
  | "invalid_model"
  | "invalid_parameter"
  | "transport_error"
  | "response_parse_error"
  | "config_invalid"
  | "config_missing"
  | "catalog_entry_unknown";

export type CtxaskErrorDetails = Record<string, unknown>;

type CtxaskErrorInput = {
  code: CtxaskErrorCode;
  message: string;
  remediation?: string[];
  details?: CtxaskErrorDetails;
  name?: string;
  cause?: unknown;
};

export class CtxaskError extends Error {
  readonly code: CtxaskErrorCode;
  readonly remediation: string[];
  readonly details?: CtxaskErrorDetails;

  constructor({ code, message, remediation, details, name, cause }: CtxaskErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name ?? "CtxaskError";
    this.code = code;
    this.remediation = remediation ?? [];
    this.details = details;
  }
}

export class TokenBudgetExceededError extends CtxaskError {
  readonly total: number;
  readonly limit: number;

  constructor(total: number, limit: number) {
    super({
      code: "token_budget_exceeded",
      name: "TokenBudgetExceededError",
      message: `Total tokens (${total}) exceed max_tokens (${limit})`,
      remediation: [
        "Narrow the context paths or glob patterns.",
        "Raise the budget with --budget or CTXASK_CONTEXT_BUDGET.",
      ],
      details: { total, limit },
    });
    this.total = total;
    this.limit = limit;
  }
}

export class InvalidModelError extends CtxaskError {
  readonly model: string;

  constructor(model: string, available: string[]) {
    super({
      code: "invalid_model",
      name: "InvalidModelError",
      message: `Invalid model name: ${model}. Valid models are:${["", ...available].join("\n- ")}`,
      details: { model, available },
    });
    this.model = model;
  }
}

export class InvalidParameterError extends CtxaskError {
  readonly parameter: string;
  readonly value: number;

  constructor(parameter: string, value: number, expectation: string) {
    super({
      code: "invalid_parameter",
      name: "InvalidParameterError",
      message: `Invalid ${parameter}: ${expectation}, got ${value}`,
      details: { parameter, value },
    });
    this.parameter = parameter;
    this.value = value;
  }
}

export class TransportError extends CtxaskError {
  readonly status?: number;
  readonly attempts: number;

  constructor(message: string, input: { status?: number; attempts: number; cause?: unknown }) {
    super({
      code: "transport_error",
      name: "TransportError",
      message,
      details: { status: input.status, attempts: input.attempts },
      cause: input.cause,
    });
    this.status = input.status;
    this.attempts = input.attempts;
  }
}

export class ResponseParseError extends CtxaskError {
  constructor(body: string, cause?: unknown) {
    const preview = body.length > 200 ? `${body.slice(0, 200)}...` : body;
    super({
      code: "response_parse_error",
      name: "ResponseParseError",
      message: `Error parsing response: body is not valid JSON (${preview})`,
      details: { body },
      cause,
    });
  }
}

export class ConfigError extends CtxaskError {
  constructor(message: string, details?: CtxaskErrorDetails) {
    super({ code: "config_invalid", name: "ConfigError", message, details });
  }
}

export class MissingConfigError extends CtxaskError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super({
      code: "config_missing",
      name: "MissingConfigError",
      message: `Missing required config: ${missing.join(", ")}`,
      remediation: [
        "Set CTXASK_URL and CTXASK_USER, pass --url/--user, or add them to ctxask.config.json.",
      ],
      details: { missing },
    });
    this.missing = missing;
  }
}

export type CatalogKind = "system prompt" | "task";

export class UnknownCatalogEntryError extends CtxaskError {
  constructor(kind: CatalogKind, name: string, available: string[]) {
    super({
      code: "catalog_entry_unknown",
      name: "UnknownCatalogEntryError",
      message: `Unknown ${kind}: ${name}. Available: ${available.length ? available.join(", ") : "(none)"}`,
      details: { kind, name, available },
    });
  }
}

export const isCtxaskError = (error: unknown): error is CtxaskError => error instanceof CtxaskError;

export const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  if (isCtxaskError(error) && error.remediation.length) {
    return [error.message, ...error.remediation.map((hint) => `  - ${hint}`)].join("\n");
  }
  return error.message;
};
