import type { AgentErrorCode, RunFailure, Session } from "../types";

const RETRYABLE: ReadonlySet<AgentErrorCode> = new Set(["BackendUnavailable"]);

export interface AgentErrorOptions {
  runId?: string;
  details?: unknown;
  cause?: unknown;
}

/**
 * Classified failure of a registry, router or orchestration operation.
 * `code` is the structured classification; `message` is the reason shown to users.
 */
export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly runId?: string;
  readonly details?: unknown;

  constructor(code: AgentErrorCode, message: string, options: AgentErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AgentError";
    this.code = code;
    this.runId = options.runId;
    this.details = options.details;
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.code);
  }

  toFailure(): RunFailure {
    return { code: this.code, message: this.message };
  }

  static fromFailure(failure: RunFailure, runId?: string): AgentError {
    return new AgentError(failure.code, failure.message, { runId });
  }
}

export interface OrchestrationErrorOptions {
  stage?: number;
  agentName?: string;
  session?: Session;
}

/** A workflow step failed; `cause` holds the step's own AgentError. */
export class OrchestrationError extends AgentError {
  readonly stage?: number;
  readonly agentName?: string;
  readonly session?: Session;

  constructor(cause: AgentError, message: string, options: OrchestrationErrorOptions = {}) {
    super(cause.code, message, { runId: cause.runId, details: cause.details, cause });
    this.name = "OrchestrationError";
    this.stage = options.stage;
    this.agentName = options.agentName;
    this.session = options.session;
  }
}

/** Classification of an HTTP error status answered by a remote agent host. */
export function codeForHttpStatus(status: number): AgentErrorCode {
  if (status === 502 || status === 503 || status === 504) {
    return "BackendUnavailable";
  }
  return status === 404 ? "AgentNotFound" : "BackendError";
}

/** Wrap anything thrown by a backend or handler into an AgentError. */
export function toAgentError(error: unknown, fallback: AgentErrorCode = "BackendError"): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AgentError(fallback, message, { cause: error });
}
