import { v4 as uuidv4 } from "uuid";
import type { Message, Part, Run, RunEvent, RunEventType, RunFailure, RunMode, RunState } from "../types";
import { createMessage, createPart } from "./message";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  created: ["in-progress", "failed"],
  "in-progress": ["completed", "failed"],
  completed: [],
  failed: [],
};

export function isTerminalState(state: RunState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Lifecycle of a single Run and the ordered events describing it.
 *
 * Every event gets the next sequence number of the run. Run snapshots are
 * frozen, so a snapshot handed out before a transition keeps describing the
 * state it was taken in.
 */
export class RunStateMachine {
  private current: Run;
  private nextSequence = 0;
  private readonly output: Message[] = [];
  private pendingParts: Part[] = [];

  constructor(agentName: string, input: readonly Message[], mode: RunMode, id: string = uuidv4()) {
    const run: Run = {
      id,
      agentName,
      input: Object.freeze([...input]),
      mode,
      state: "created",
      createdAt: Date.now(),
    };
    this.current = Object.freeze(run);
  }

  get run(): Run {
    return this.current;
  }

  get runId(): string {
    return this.current.id;
  }

  get state(): RunState {
    return this.current.state;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.current.state);
  }

  get hasPendingParts(): boolean {
    return this.pendingParts.length > 0;
  }

  /** The `run.created` event. Must be the first event of the run. */
  created(): RunEvent {
    if (this.nextSequence !== 0) {
      throw new Error(`Run ${this.runId} already announced`);
    }
    return this.emit({ type: "run.created", payload: { run: this.current } });
  }

  start(): RunEvent {
    this.transition("in-progress");
    return this.emit({ type: "run.in-progress", payload: { run: this.current } });
  }

  generic(data: Record<string, unknown>): RunEvent {
    this.requireInProgress("generic");
    return this.emit({ type: "generic", payload: data });
  }

  appendPart(part: Part): RunEvent {
    this.requireInProgress("message.part");
    const frozen = createPart(part.content, part.mimeType);
    this.pendingParts.push(frozen);
    return this.emit({ type: "message.part", payload: { messageIndex: this.output.length, part: frozen } });
  }

  /** Finalize the parts appended since the last completed message. */
  completeMessage(): RunEvent {
    this.requireInProgress("message.completed");
    if (this.pendingParts.length === 0) {
      throw new Error(`Run ${this.runId} has no pending parts to complete`);
    }
    const message = createMessage("agent", this.pendingParts);
    this.pendingParts = [];
    const messageIndex = this.output.length;
    this.output.push(message);
    return this.emit({ type: "message.completed", payload: { messageIndex, message } });
  }

  /** Emit a whole message: closes any pending one, then its parts, then completion. */
  appendMessage(message: Message): RunEvent[] {
    const events: RunEvent[] = [];
    if (this.pendingParts.length > 0) {
      events.push(this.completeMessage());
    }
    for (const part of message.parts) {
      events.push(this.appendPart(part));
    }
    events.push(this.completeMessage());
    return events;
  }

  complete(): RunEvent {
    if (this.pendingParts.length > 0) {
      throw new Error(`Run ${this.runId} has an unfinished message`);
    }
    const output = Object.freeze([...this.output]);
    this.transition("completed", { output });
    return this.emit({ type: "run.completed", payload: { run: this.current, output } });
  }

  fail(error: RunFailure): RunEvent {
    this.pendingParts = [];
    const failure = Object.freeze({ code: error.code, message: error.message });
    this.transition("failed", { error: failure });
    return this.emit({ type: "run.failed", payload: { run: this.current, error: failure } });
  }

  private requireInProgress(eventType: RunEventType): void {
    if (this.current.state !== "in-progress") {
      throw new Error(`Cannot emit ${eventType} for run ${this.runId} in state ${this.current.state}`);
    }
  }

  private transition(to: RunState, extra: Partial<Pick<Run, "output" | "error">> = {}): void {
    const from = this.current.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal run transition ${from} -> ${to} for run ${this.runId}`);
    }
    this.current = Object.freeze({ ...this.current, ...extra, state: to });
  }

  private emit(draft: RunEventDraft): RunEvent {
    return makeEvent(this.current.id, this.nextSequence++, draft);
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event without its run id and sequence number. */
export type RunEventDraft = DistributiveOmit<RunEvent, "runId" | "sequence">;

export function makeEvent(runId: string, sequence: number, draft: RunEventDraft): RunEvent {
  return Object.freeze({ ...draft, runId, sequence });
}
