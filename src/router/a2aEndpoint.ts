import type {
  Message as A2AMessage,
  MessageSendParams,
  Part as A2APart,
  Task,
  TaskArtifactUpdateEvent,
  TaskStatus,
  TaskStatusUpdateEvent,
} from "@a2a-js/sdk";
import { ClientFactory } from "@a2a-js/sdk/client";
import { v4 as uuidv4 } from "uuid";
import { AgentError, codeForHttpStatus, toAgentError } from "../protocol/errors";
import { completedResult } from "../protocol/events";
import { createMessage, createPart, messageText } from "../protocol/message";
import { RunStateMachine } from "../protocol/runStateMachine";
import type { Message, Part, RunEvent, RunResult } from "../types";
import { abortReason, raceAbort } from "../utils/abort";
import type { AgentBackend, BackendRequest } from "./backend";
import { DEFAULT_RETRY, withRetry, type RetryPolicy } from "./retry";

export type A2AStreamItem = A2AMessage | Task | TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

export interface A2ARequestOptions {
  signal?: AbortSignal;
}

/** The part of an A2A client the endpoint uses. */
export interface A2AConnection {
  sendMessage(params: MessageSendParams, options?: A2ARequestOptions): Promise<A2AMessage | Task>;
  sendMessageStream(params: MessageSendParams, options?: A2ARequestOptions): AsyncIterable<A2AStreamItem>;
}

export type A2AConnector = (cardUrl: string) => Promise<A2AConnection>;

export const connectA2A: A2AConnector = (cardUrl) => {
  const url = new URL(cardUrl);
  return new ClientFactory().createFromUrl(url.origin, `${url.pathname}${url.search}`);
};

// The SDK reports HTTP failures as "HTTP error for <method>! Status: <code> ...".
const HTTP_STATUS = /\bStatus:\s*(\d{3})\b/;

/**
 * Classify an error thrown by the A2A client: network failures and 502, 503
 * and 504 answers are BackendUnavailable, 404 is AgentNotFound, anything
 * else (other HTTP statuses, JSON-RPC errors) is BackendError.
 */
export function classifyA2AError(error: unknown): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = HTTP_STATUS.exec(message)?.[1];
  if (status !== undefined) {
    return new AgentError(codeForHttpStatus(Number(status)), message, { cause: error });
  }
  // fetch rejects with a TypeError when the host cannot be reached
  return new AgentError(error instanceof TypeError ? "BackendUnavailable" : "BackendError", message, { cause: error });
}

const COMPLETED_STATES = new Set(["completed", "input-required"]);
const FAILED_STATES = new Set(["failed", "rejected", "canceled"]);

export function fromA2APart(part: A2APart): Part {
  switch (part.kind) {
    case "text":
      return createPart(part.text);
    case "data":
      return createPart(JSON.stringify(part.data), "application/json");
    case "file":
      return "uri" in part.file
        ? createPart(part.file.uri, part.file.mimeType)
        : createPart(part.file.bytes, part.file.mimeType ?? "application/octet-stream");
  }
}

function fromA2AParts(parts: readonly A2APart[]): Message | undefined {
  return parts.length > 0 ? createMessage("agent", parts.map(fromA2APart)) : undefined;
}

function statusReason(status: TaskStatus): string {
  const message = status.message ? fromA2AParts(status.message.parts) : undefined;
  return message ? messageText(message) : `Task ended in state '${status.state}'`;
}

function taskOutput(task: Task): Message[] {
  const output: Message[] = [];
  for (const artifact of task.artifacts ?? []) {
    const message = fromA2AParts(artifact.parts);
    if (message) {
      output.push(message);
    }
  }
  const statusMessage = task.status.message ? fromA2AParts(task.status.message.parts) : undefined;
  if (statusMessage) {
    output.push(statusMessage);
  }
  return output;
}

/**
 * Agent published through an A2A agent card. Runs are translated into A2A
 * `message/send` and `message/stream` calls, and the replies back into run
 * events.
 */
export class A2AEndpoint implements AgentBackend {
  private connection?: Promise<A2AConnection>;

  constructor(
    readonly cardUrl: string,
    private readonly connector: A2AConnector = connectA2A,
    private readonly retry: RetryPolicy = DEFAULT_RETRY
  ) {}

  async invoke(request: BackendRequest): Promise<RunResult> {
    const params = this.toSendParams(request);
    const result = await withRetry(
      async () => {
        const client = await this.connect();
        try {
          return await client.sendMessage(params, { signal: request.signal });
        } catch (error) {
          if (request.signal.aborted) {
            throw abortReason(request.signal);
          }
          throw classifyA2AError(error);
        }
      },
      this.retry,
      request.signal,
      `${request.agentName} @ ${this.cardUrl}`
    );

    if (result.kind === "message") {
      const message = fromA2AParts(result.parts);
      return completedResult(request.agentName, request.input, "sync", message ? [message] : []);
    }

    const state = result.status.state;
    if (COMPLETED_STATES.has(state)) {
      return completedResult(request.agentName, request.input, "sync", taskOutput(result), result.id);
    }
    if (FAILED_STATES.has(state)) {
      throw new AgentError("BackendError", statusReason(result.status), { runId: result.id, details: result });
    }
    throw new AgentError("BackendError", `Task ${result.id} is still '${state}'; polling is not supported`, {
      runId: result.id,
      details: result,
    });
  }

  async *invokeStream(request: BackendRequest): AsyncGenerator<RunEvent, void, undefined> {
    const machine = new RunStateMachine(request.agentName, request.input, "stream");
    yield machine.created();
    yield machine.start();

    const client = await raceAbort(this.connect(), request.signal);
    const iterator = client
      .sendMessageStream(this.toSendParams(request), { signal: request.signal })
      [Symbol.asyncIterator]();
    try {
      for (;;) {
        let step: IteratorResult<A2AStreamItem>;
        try {
          step = await raceAbort(iterator.next(), request.signal);
        } catch (error) {
          throw request.signal.aborted ? error : classifyA2AError(error);
        }
        if (step.done) {
          break;
        }
        yield* this.translate(machine, step.value);
        if (machine.isTerminal) {
          return;
        }
      }
      if (machine.hasPendingParts) {
        yield machine.completeMessage();
      }
      yield machine.complete();
    } finally {
      if (iterator.return) {
        iterator.return().catch((error: unknown) => {
          console.error(`[A2A] Failed to close stream from ${this.cardUrl}:`, error);
        });
      }
    }
  }

  private *translate(machine: RunStateMachine, item: A2AStreamItem): Generator<RunEvent> {
    switch (item.kind) {
      case "message": {
        const message = fromA2AParts(item.parts);
        if (message) {
          yield* machine.appendMessage(message);
        }
        yield* this.finish(machine);
        return;
      }
      case "task":
        yield machine.generic({ a2a: "task", taskId: item.id, state: item.status.state });
        if (FAILED_STATES.has(item.status.state)) {
          yield machine.fail({ code: "BackendError", message: statusReason(item.status) });
        } else if (COMPLETED_STATES.has(item.status.state)) {
          for (const message of taskOutput(item)) {
            yield* machine.appendMessage(message);
          }
          yield* this.finish(machine);
        }
        return;
      case "status-update": {
        const { state } = item.status;
        const message = item.status.message ? fromA2AParts(item.status.message.parts) : undefined;
        // Only a final completed status carries output; other status text is progress.
        const isOutput = item.final && COMPLETED_STATES.has(state);
        yield machine.generic({
          a2a: "status-update",
          state,
          final: item.final,
          ...(message && !isOutput ? { text: messageText(message) } : {}),
        });
        if (FAILED_STATES.has(state)) {
          yield machine.fail({ code: "BackendError", message: statusReason(item.status) });
        } else if (isOutput) {
          if (message) {
            yield* machine.appendMessage(message);
          }
          yield* this.finish(machine);
        } else if (item.final) {
          yield machine.fail({ code: "BackendError", message: `Task ${item.taskId} ended the stream while '${state}'` });
        }
        return;
      }
      case "artifact-update":
        for (const part of item.artifact.parts) {
          yield machine.appendPart(fromA2APart(part));
        }
        if (item.lastChunk !== false && machine.hasPendingParts) {
          yield machine.completeMessage();
        }
        return;
    }
  }

  private *finish(machine: RunStateMachine): Generator<RunEvent> {
    if (machine.hasPendingParts) {
      yield machine.completeMessage();
    }
    yield machine.complete();
  }

  private toSendParams(request: BackendRequest): MessageSendParams {
    const message: A2AMessage = {
      kind: "message",
      messageId: uuidv4(),
      role: "user",
      parts: request.input.map((input) => ({ kind: "text", text: messageText(input) })),
    };
    return { message };
  }

  private connect(): Promise<A2AConnection> {
    if (!this.connection) {
      console.log(`[A2A] Initializing client from: ${this.cardUrl}`);
      const pending = this.connector(this.cardUrl);
      this.connection = pending;
      pending.catch((error: unknown) => {
        console.error(`[A2A] Could not load agent card ${this.cardUrl}:`, error);
        if (this.connection === pending) {
          this.connection = undefined;
        }
      });
    }
    // a card that cannot be loaded is retried like an unreachable host
    return this.connection.catch((error: unknown) => {
      throw toAgentError(error, "BackendUnavailable");
    });
  }
}
