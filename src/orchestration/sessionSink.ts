import type { Message, RunFailure, Session } from "../types";

export type SessionEvent =
  | { type: "session.started"; session: Session }
  | { type: "session.turn"; session: Session; agentName: string; entries: readonly Message[] }
  | { type: "session.finished"; session: Session; error?: RunFailure };

/** Receives structured session events, e.g. to persist transcripts. */
export interface SessionSink {
  record(event: SessionEvent): Promise<void>;
}

/** Keeps every event in memory. */
export class MemorySessionSink implements SessionSink {
  readonly events: SessionEvent[] = [];

  async record(event: SessionEvent): Promise<void> {
    this.events.push(event);
  }
}
