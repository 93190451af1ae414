import { AgentError, codeForHttpStatus } from "../protocol/errors";
import { completedResult } from "../protocol/events";
import { readSseData } from "../protocol/sse";
import {
  failureFromResponse,
  parseRunEvent,
  SyncRunResponseSchema,
  toWireMessage,
  type RunRequestBody,
} from "../protocol/wire";
import type { RunEvent, RunMode, RunResult } from "../types";
import { abortReason } from "../utils/abort";
import type { AgentBackend, BackendRequest } from "./backend";
import { withRetry, type RetryPolicy } from "./retry";

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  }
  return String(error);
}

function parseJson(text: string, source: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw new AgentError("MalformedResponse", `${source} answered with invalid JSON`, { details: text, cause: error });
  }
}

/**
 * Client for one host speaking the run protocol over HTTP.
 *
 * Node's fetch keeps a connection pool per origin; the Router keeps one
 * RemoteEndpoint per endpoint so every agent on a host shares it.
 */
export class RemoteEndpoint implements AgentBackend {
  constructor(
    readonly endpoint: string,
    private readonly retry: RetryPolicy
  ) {}

  async invoke(request: BackendRequest): Promise<RunResult> {
    const response = await this.post(request, "sync", "application/json");
    const raw = parseJson(await response.text(), this.endpoint);

    const parsed = SyncRunResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AgentError("MalformedResponse", `Unexpected run response from ${this.endpoint}`, { details: raw });
    }

    const body = parsed.data;
    if (body.status === "failed") {
      throw AgentError.fromFailure(failureFromResponse(body.error), body.run_id);
    }
    return completedResult(request.agentName, request.input, "sync", body.output, body.run_id);
  }

  async *invokeStream(request: BackendRequest): AsyncGenerator<RunEvent, void, undefined> {
    const response = await this.post(request, "stream", "text/event-stream");
    const contentType = response.headers.get("content-type") ?? "";
    if (!response.body || !contentType.includes("text/event-stream")) {
      const details = await response.text();
      throw new AgentError("MalformedResponse", `Expected an event stream from ${this.endpoint}, got '${contentType}'`, {
        details,
      });
    }

    for await (const data of readSseData(response.body)) {
      const raw = parseJson(data, this.endpoint);
      const event = parseRunEvent(raw);
      if (!event) {
        throw new AgentError("MalformedResponse", `Unrecognized event from ${this.endpoint}`, { details: raw });
      }
      yield event;
    }
  }

  private post(request: BackendRequest, mode: RunMode, accept: string): Promise<Response> {
    const body: RunRequestBody = {
      agent_name: request.remoteName,
      input: request.input.map(toWireMessage),
      mode,
    };
    return withRetry(
      () => this.send(JSON.stringify(body), accept, request.signal),
      this.retry,
      request.signal,
      `${request.agentName} @ ${this.endpoint}`
    );
  }

  private async send(body: string, accept: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.endpoint}/runs`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: accept },
        body,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw abortReason(signal);
      }
      throw new AgentError("BackendUnavailable", `Could not reach ${this.endpoint}: ${describe(error)}`, {
        cause: error,
      });
    }

    if (response.ok) {
      return response;
    }

    const details = await response.text();
    const status = `${response.status} ${response.statusText}`.trim();
    switch (codeForHttpStatus(response.status)) {
      case "BackendUnavailable":
        throw new AgentError("BackendUnavailable", `${this.endpoint} is unavailable: ${status}`, { details });
      case "AgentNotFound":
        throw new AgentError("AgentNotFound", `${this.endpoint} does not serve the requested agent: ${status}`, {
          details,
        });
      default:
        throw new AgentError("BackendError", `${this.endpoint} rejected the run: ${status}`, { details });
    }
  }
}
