import { AgentError, toAgentError } from "../protocol/errors";
import { EventSequenceGuard } from "../protocol/events";
import { assertValidInput } from "../protocol/message";
import type { AgentRegistry } from "../registry/agentRegistry";
import type { AgentDescriptor, Message, RunEvent, RunResult } from "../types";
import { abortReason, createDeadline, raceAbort } from "../utils/abort";
import { A2AEndpoint, connectA2A, type A2AConnector } from "./a2aEndpoint";
import type { AgentBackend, BackendRequest } from "./backend";
import { LocalCapability } from "./localCapability";
import { RemoteEndpoint } from "./remoteEndpoint";
import { DEFAULT_RETRY, type RetryPolicy } from "./retry";

export const DEFAULT_TIMEOUT_MS = 300_000;

export interface RouterOptions {
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  a2aConnector?: A2AConnector;
}

export interface CallOptions {
  signal?: AbortSignal;
  /** Overrides the router's default deadline for this call. */
  timeoutMs?: number;
}

export interface SyncCallOptions extends CallOptions {
  mode: "sync";
}

export interface StreamCallOptions extends CallOptions {
  mode: "stream";
}

/** Lazy, single-pass sequence of one run's events, ending in its terminal event. */
export type RunEventStream = AsyncIterable<RunEvent>;

/**
 * Uniform dispatch to local and remote agents.
 *
 * Sync calls resolve with the completed run or reject with an AgentError.
 * Streams always end in exactly one terminal event, synthesized here when a
 * backend breaks off, times out or breaks the sequence contract. A caller
 * cancelling a stream just stops receiving events.
 */
export class Router {
  private readonly endpoints: Map<string, AgentBackend> = new Map();
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly a2aConnector: A2AConnector;

  constructor(
    private readonly registry: AgentRegistry,
    options: RouterOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.a2aConnector = options.a2aConnector ?? connectA2A;
  }

  call(agentName: string, input: readonly Message[], options: SyncCallOptions): Promise<RunResult>;
  call(agentName: string, input: readonly Message[], options: StreamCallOptions): RunEventStream;
  call(
    agentName: string,
    input: readonly Message[],
    options: SyncCallOptions | StreamCallOptions
  ): Promise<RunResult> | RunEventStream {
    return options.mode === "stream" ? this.stream(agentName, input, options) : this.run(agentName, input, options);
  }

  async run(agentName: string, input: readonly Message[], options: CallOptions = {}): Promise<RunResult> {
    const descriptor = this.registry.lookup(agentName);
    assertValidInput(input);
    const backend = this.backendFor(descriptor);

    const deadline = createDeadline(options.timeoutMs ?? this.timeoutMs, options.signal);
    const startedAt = Date.now();
    try {
      const result = await raceAbort(backend.invoke(this.request(descriptor, input, deadline.signal)), deadline.signal);
      console.log(`[Router] ${agentName} completed in ${Date.now() - startedAt}ms`);
      return result;
    } catch (error) {
      const failure = deadline.signal.aborted ? abortReason(deadline.signal) : toAgentError(error);
      console.error(`[Router] ${agentName} failed after ${Date.now() - startedAt}ms: ${failure.code} ${failure.message}`);
      throw failure;
    } finally {
      deadline.cancel();
      deadline.dispose();
    }
  }

  /** Throws AgentNotFound or InvalidInput right away; nothing runs until iteration starts. */
  stream(agentName: string, input: readonly Message[], options: CallOptions = {}): RunEventStream {
    const descriptor = this.registry.lookup(agentName);
    assertValidInput(input);
    const backend = this.backendFor(descriptor);
    return this.guardedStream(descriptor, backend, input, options);
  }

  /** Drop pooled endpoint clients. Runs in flight keep the client they hold. */
  close(): void {
    const count = this.endpoints.size;
    this.endpoints.clear();
    console.log(`[Router] Closed ${count} endpoint client(s)`);
  }

  private async *guardedStream(
    descriptor: AgentDescriptor,
    backend: AgentBackend,
    input: readonly Message[],
    options: CallOptions
  ): AsyncGenerator<RunEvent, void, undefined> {
    const deadline = createDeadline(options.timeoutMs ?? this.timeoutMs, options.signal);
    const guard = new EventSequenceGuard(descriptor.name, input, "stream");
    const iterator = backend.invokeStream(this.request(descriptor, input, deadline.signal))[Symbol.asyncIterator]();

    try {
      for (;;) {
        let step: IteratorResult<RunEvent>;
        try {
          step = await raceAbort(iterator.next(), deadline.signal);
        } catch (error) {
          if (options.signal?.aborted) {
            console.log(`[Router] ${descriptor.name} stream cancelled by caller`);
            return;
          }
          const failure = deadline.signal.aborted ? abortReason(deadline.signal) : toAgentError(error, "BackendUnavailable");
          console.error(`[Router] ${descriptor.name} stream failed: ${failure.code} ${failure.message}`);
          yield* guard.closeWith(failure);
          return;
        }
        if (step.done) {
          break;
        }

        try {
          guard.accept(step.value);
        } catch (error) {
          const failure = toAgentError(error, "MalformedResponse");
          console.error(`[Router] ${descriptor.name} stream rejected: ${failure.message}`);
          yield* guard.closeWith(failure);
          return;
        }
        yield step.value;
        if (guard.terminated) {
          return;
        }
      }
      yield* guard.closeWith(
        new AgentError("BackendUnavailable", `Stream from ${descriptor.name} ended without a terminal event`)
      );
    } finally {
      // reached early when the consumer stops iterating
      deadline.cancel();
      deadline.dispose();
      if (iterator.return) {
        iterator.return().catch((error: unknown) => {
          console.error(`[Router] Failed to close ${descriptor.name} stream:`, error);
        });
      }
    }
  }

  private request(descriptor: AgentDescriptor, input: readonly Message[], signal: AbortSignal): BackendRequest {
    return {
      agentName: descriptor.name,
      remoteName: descriptor.kind === "remote" ? descriptor.remoteName : descriptor.name,
      input,
      signal,
    };
  }

  private backendFor(descriptor: AgentDescriptor): AgentBackend {
    if (descriptor.kind === "local") {
      return new LocalCapability(descriptor.handler);
    }

    const key = `${descriptor.protocol}:${descriptor.endpoint}`;
    let backend = this.endpoints.get(key);
    if (!backend) {
      backend =
        descriptor.protocol === "a2a"
          ? new A2AEndpoint(descriptor.endpoint, this.a2aConnector, this.retry)
          : new RemoteEndpoint(descriptor.endpoint, this.retry);
      this.endpoints.set(key, backend);
      console.log(`[Router] Opened client for ${key}`);
    }
    return backend;
  }
}
