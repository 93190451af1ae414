import { setImmediate as yieldToLoop } from "node:timers/promises";
import type { AgentHandler, AgentOutput, AgentYield, Message, RunEvent, RunMode } from "../types";
import { abortReason, raceAbort, throwIfAborted } from "../utils/abort";
import { toAgentError } from "./errors";
import { agentMessage, createPart } from "./message";
import { RunStateMachine } from "./runStateMachine";

export interface ExecuteOptions {
  mode: RunMode;
  signal: AbortSignal;
  runId?: string;
}

function isYieldStream(value: ReturnType<AgentHandler>): value is AsyncIterable<AgentYield> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

function normalizeOutput(output: AgentOutput): readonly Message[] {
  if (typeof output === "string") {
    return [agentMessage(output)];
  }
  if ("parts" in output) {
    return [output];
  }
  return output;
}

function* applyYield(machine: RunStateMachine, item: AgentYield): Generator<RunEvent> {
  if (typeof item === "string") {
    yield machine.appendPart(createPart(item));
    return;
  }
  switch (item.kind) {
    case "part":
      yield machine.appendPart(item.part);
      return;
    case "generic":
      yield machine.generic(item.data);
      return;
    case "message":
      if (item.message) {
        yield* machine.appendMessage(item.message);
      } else if (machine.hasPendingParts) {
        yield machine.completeMessage();
      }
      return;
  }
}

/**
 * Run an in-process handler and describe it as protocol events.
 *
 * Always ends with exactly one terminal event. Between handler steps control
 * goes back to the event loop so a busy handler cannot starve other runs.
 */
export async function* executeHandler(
  agentName: string,
  handler: AgentHandler,
  input: readonly Message[],
  options: ExecuteOptions
): AsyncGenerator<RunEvent, void, undefined> {
  const { signal } = options;
  const machine = new RunStateMachine(agentName, input, options.mode, options.runId);
  yield machine.created();

  if (signal.aborted) {
    yield machine.fail(abortReason(signal).toFailure());
    return;
  }
  yield machine.start();

  const events: RunEvent[] = [];
  let iterator: AsyncIterator<AgentYield> | undefined;
  try {
    const result = handler(input, { runId: machine.runId, agentName, signal });
    if (isYieldStream(result)) {
      iterator = result[Symbol.asyncIterator]();
      for (;;) {
        const step = await raceAbort(iterator.next(), signal);
        if (step.done) {
          iterator = undefined;
          break;
        }
        events.push(...applyYield(machine, step.value));
        yield* drain(events);
        await yieldToLoop();
      }
    } else {
      const output = await raceAbort(Promise.resolve(result), signal);
      for (const message of normalizeOutput(output)) {
        events.push(...machine.appendMessage(message));
      }
    }
    if (machine.hasPendingParts) {
      events.push(machine.completeMessage());
    }
    throwIfAborted(signal);
    yield* drain(events);
    yield machine.complete();
  } catch (error) {
    events.length = 0;
    const failure = signal.aborted ? abortReason(signal) : toAgentError(error);
    yield machine.fail(failure.toFailure());
  } finally {
    if (iterator?.return) {
      iterator.return().catch((error: unknown) => {
        console.error(`[Executor] ${agentName} did not close cleanly:`, error);
      });
    }
  }
}

function* drain(events: RunEvent[]): Generator<RunEvent> {
  while (events.length > 0) {
    const event = events.shift();
    if (event) {
      yield event;
    }
  }
}
