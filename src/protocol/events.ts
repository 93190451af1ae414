import type { Message, Run, RunEvent, RunMode, RunResult } from "../types";
import { AgentError } from "./errors";
import { makeEvent, RunStateMachine } from "./runStateMachine";

/**
 * Checks an incoming event stream against the protocol: one run id, sequence
 * numbers from 0 without gaps, `run.created` first and nothing after the
 * terminal event. Also closes streams that broke off with a synthesized
 * `run.failed`.
 */
export class EventSequenceGuard {
  private expected = 0;
  private runId?: string;
  private lastRun?: Run;
  private terminal = false;

  constructor(
    private readonly agentName: string,
    private readonly input: readonly Message[],
    private readonly mode: RunMode
  ) {}

  get terminated(): boolean {
    return this.terminal;
  }

  get started(): boolean {
    return this.expected > 0;
  }

  /** Throws MalformedResponse when `event` breaks the sequence contract. */
  accept(event: RunEvent): void {
    if (this.terminal) {
      throw this.malformed(`Event ${event.type} arrived after the terminal event`, event);
    }
    if (this.expected === 0 && event.type !== "run.created") {
      throw this.malformed(`Stream started with ${event.type} instead of run.created`, event);
    }
    if (this.runId !== undefined && event.runId !== this.runId) {
      throw this.malformed(`Event for run ${event.runId} inside run ${this.runId}`, event);
    }
    if (event.sequence !== this.expected) {
      throw this.malformed(`Expected sequence ${this.expected}, got ${event.sequence}`, event);
    }

    this.runId = event.runId;
    this.expected += 1;
    switch (event.type) {
      case "run.created":
      case "run.in-progress":
        this.lastRun = event.payload.run;
        break;
      case "run.completed":
      case "run.failed":
        this.lastRun = event.payload.run;
        this.terminal = true;
        break;
      default:
        break;
    }
  }

  /** Events that end this stream with `error`, continuing its numbering. */
  closeWith(error: AgentError): RunEvent[] {
    const failure = error.toFailure();
    if (this.terminal) {
      return [];
    }
    this.terminal = true;

    if (!this.runId || !this.lastRun) {
      const machine = new RunStateMachine(this.agentName, this.input, this.mode, this.runId);
      return [machine.created(), machine.fail(failure)];
    }

    const run: Run = Object.freeze({ ...this.lastRun, state: "failed", error: failure });
    return [makeEvent(this.runId, this.expected, { type: "run.failed", payload: { run, error: failure } })];
  }

  private malformed(message: string, event: RunEvent): AgentError {
    return new AgentError("MalformedResponse", message, { runId: this.runId ?? event.runId, details: event });
  }
}

/**
 * Drain a run's events and keep only the outcome. Resolves with the output
 * of a completed run; rejects with the classified failure otherwise.
 */
export async function collectResult(events: AsyncIterable<RunEvent>): Promise<RunResult> {
  let runId: string | undefined;
  for await (const event of events) {
    runId = event.runId;
    if (event.type === "run.completed") {
      return { run: event.payload.run, output: event.payload.output };
    }
    if (event.type === "run.failed") {
      throw AgentError.fromFailure(event.payload.error, event.runId);
    }
  }
  throw new AgentError("BackendUnavailable", "Event stream ended without a terminal event", { runId });
}

/** Client-side record of a run that finished elsewhere with `output`. */
export function completedResult(
  agentName: string,
  input: readonly Message[],
  mode: RunMode,
  output: readonly Message[],
  runId?: string
): RunResult {
  const machine = new RunStateMachine(agentName, input, mode, runId);
  machine.created();
  machine.start();
  for (const message of output) {
    machine.appendMessage(message);
  }
  machine.complete();
  return { run: machine.run, output: machine.run.output ?? [] };
}
