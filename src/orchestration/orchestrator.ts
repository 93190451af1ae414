import { v4 as uuidv4 } from "uuid";
import { AgentError, OrchestrationError, toAgentError } from "../protocol/errors";
import { createMessage, messageText, withAuthor } from "../protocol/message";
import type { Router } from "../router/router";
import type { Message, Run, RunFailure, Session, SessionKind, SessionStatus } from "../types";
import { abortReason } from "../utils/abort";
import { ConcurrencyLimiter } from "./concurrency";
import type { SessionEvent, SessionSink } from "./sessionSink";

export const DEFAULT_CONCURRENCY = 4;

export type FanOutPolicy = "fail-fast" | "best-effort";

export interface FanOutBranch {
  agentName: string;
  input: readonly Message[];
}

export interface FanOutOptions {
  policy?: FanOutPolicy;
  concurrency?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type BranchResult =
  | { index: number; agentName: string; ok: true; output: readonly Message[]; run: Run }
  | { index: number; agentName: string; ok: false; error: AgentError };

export type FanOutStatus = "completed" | "partial-failure" | "failed";

export interface FanOutReport {
  status: FanOutStatus;
  /** One entry per branch, in request order. */
  results: BranchResult[];
}

export interface WorkflowOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface PipelineResult {
  output: readonly Message[];
  stages: Run[];
  session: Session;
}

export interface DebateContext {
  topic: string;
  transcript: readonly Message[];
  /** Agent about to speak; the synthesizer for the final turn. */
  speaker: string;
  round: number;
  rounds: number;
  synthesis: boolean;
}

export type ContextBuilder = (context: DebateContext) => Message;

export interface DebateOptions extends WorkflowOptions {
  topic: string;
  participants: readonly string[];
  rounds: number;
  synthesizer?: string;
  contextBuilder?: ContextBuilder;
}

export interface DebateResult {
  transcript: readonly Message[];
  verdict?: readonly Message[];
  session: Session;
}

export interface OrchestratorOptions {
  concurrency?: number;
  sink?: SessionSink;
}

/** Context message holding the topic and every prior transcript entry. */
export const debateContext: ContextBuilder = ({ topic, transcript, speaker, round, rounds, synthesis }) => {
  const parts = [`DEBATE TOPIC: ${topic}`];
  if (transcript.length > 0) {
    parts.push("CONVERSATION SO FAR:");
    for (const entry of transcript) {
      parts.push(`${entry.author ?? entry.role}: ${messageText(entry)}`);
    }
  }
  if (synthesis) {
    parts.push(`You are ${speaker}. Weigh the arguments above and deliver a final verdict.`);
  } else if (transcript.length === 0) {
    parts.push(`You are ${speaker} and you speak first (round ${round} of ${rounds}).`);
  } else {
    parts.push(`Now respond as ${speaker} (round ${round} of ${rounds}). Address specific points made by others.`);
  }
  return createMessage("user", parts);
};

function failureStatus(error: AgentError): SessionStatus {
  return error.code === "Cancelled" ? "cancelled" : "failed";
}

/**
 * Composes Router calls into fan-out/fan-in, pipelines and debates.
 * Pipelines and debates are tracked as sessions while they run.
 */
export class Orchestrator {
  private readonly sessions: Map<string, Session> = new Map();
  private readonly concurrency: number;
  private readonly sink?: SessionSink;

  constructor(
    private readonly router: Router,
    options: OrchestratorOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.sink = options.sink;
  }

  activeSessions(): Session[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Run every branch concurrently, bounded by `concurrency`, and report the
   * results in request order. Under `fail-fast` the first failure cancels
   * the other branches and rejects with that failure.
   */
  async fanOut(branches: readonly FanOutBranch[], options: FanOutOptions = {}): Promise<FanOutReport> {
    const policy = options.policy ?? "fail-fast";
    const limiter = new ConcurrencyLimiter(options.concurrency ?? this.concurrency);
    const controller = new AbortController();
    const parent = options.signal;
    const onParentAbort = () => {
      if (parent) {
        controller.abort(abortReason(parent));
      }
    };
    if (parent?.aborted) {
      onParentAbort();
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    console.log(`[Orchestrator] Fan-out to ${branches.length} branch(es), policy ${policy}`);
    const failures: AgentError[] = [];

    const pending = branches.map((branch, index) =>
      limiter
        .schedule(
          () => this.router.run(branch.agentName, branch.input, { signal: controller.signal, timeoutMs: options.timeoutMs }),
          controller.signal
        )
        .then(
          (result): BranchResult => ({ index, agentName: branch.agentName, ok: true, output: result.output, run: result.run }),
          (error: unknown): BranchResult => {
            const failure = toAgentError(error);
            if (policy === "fail-fast" && !controller.signal.aborted) {
              failures.push(failure);
              console.warn(`[Orchestrator] Branch ${index} (${branch.agentName}) failed, cancelling siblings`);
              controller.abort(
                new AgentError("Cancelled", `Cancelled because branch ${index} (${branch.agentName}) failed`)
              );
            }
            return { index, agentName: branch.agentName, ok: false, error: failure };
          }
        )
    );

    let results: BranchResult[];
    try {
      results = await Promise.all(pending);
    } finally {
      parent?.removeEventListener("abort", onParentAbort);
    }

    if (policy === "fail-fast") {
      const [firstFailure] = failures;
      if (firstFailure) {
        throw firstFailure;
      }
      if (parent?.aborted) {
        throw abortReason(parent);
      }
    }

    const failed = results.filter((result) => !result.ok).length;
    const status: FanOutStatus =
      failed === 0 ? "completed" : failed === results.length ? "failed" : "partial-failure";
    console.log(`[Orchestrator] Fan-out finished: ${status} (${results.length - failed}/${results.length} ok)`);
    return { status, results };
  }

  /** Feed each stage's full output to the next stage. Stops at the first failure. */
  async pipeline(
    agentNames: readonly string[],
    input: readonly Message[],
    options: WorkflowOptions = {}
  ): Promise<PipelineResult> {
    if (agentNames.length === 0) {
      throw new AgentError("InvalidInput", "A pipeline needs at least one stage");
    }

    let session = await this.openSession("pipeline", agentNames);
    const stages: Run[] = [];
    let current = input;

    for (const [stage, agentName] of agentNames.entries()) {
      try {
        const result = await this.router.run(agentName, current, options);
        stages.push(result.run);
        current = result.output;
        session = await this.recordTurn(session, agentName, result.output, stage + 1);
      } catch (error) {
        const failure = toAgentError(error);
        session = await this.closeSession(session, failureStatus(failure), failure.toFailure());
        throw new OrchestrationError(failure, `Pipeline stage ${stage} (${agentName}) failed: ${failure.message}`, {
          stage,
          agentName,
          session,
        });
      }
    }

    session = await this.closeSession(session, "completed");
    return { output: current, stages, session };
  }

  /**
   * Participants speak in order for every round, each seeing the topic and
   * the whole transcript so far. The synthesizer, if any, speaks last.
   */
  async debate(options: DebateOptions): Promise<DebateResult> {
    const { topic, participants, rounds, synthesizer } = options;
    if (participants.length === 0) {
      throw new AgentError("InvalidInput", "A debate needs at least one participant");
    }
    if (!Number.isInteger(rounds) || rounds < 1) {
      throw new AgentError("InvalidInput", `Rounds must be a positive integer, got ${rounds}`);
    }

    const buildContext = options.contextBuilder ?? debateContext;
    const callOptions: WorkflowOptions = { signal: options.signal, timeoutMs: options.timeoutMs };
    let session = await this.openSession("debate", participants, topic);

    const turn = async (speaker: string, round: number, synthesis: boolean): Promise<readonly Message[]> => {
      const context = buildContext({ topic, transcript: session.transcript, speaker, round, rounds, synthesis });
      try {
        const result = await this.router.run(speaker, [context], callOptions);
        return result.output.map((message) => withAuthor(message, speaker));
      } catch (error) {
        const failure = toAgentError(error);
        session = await this.closeSession(session, failureStatus(failure), failure.toFailure());
        throw new OrchestrationError(failure, `Debate turn of ${speaker} in round ${round} failed: ${failure.message}`, {
          agentName: speaker,
          session,
        });
      }
    };

    for (let round = 1; round <= rounds; round++) {
      console.log(`[Orchestrator] Debate ${session.id} round ${round}/${rounds}`);
      for (const participant of participants) {
        const entries = await turn(participant, round, false);
        session = await this.recordTurn(session, participant, entries, round);
      }
    }

    let verdict: readonly Message[] | undefined;
    if (synthesizer) {
      verdict = await turn(synthesizer, rounds, true);
    }

    const transcript = session.transcript;
    session = await this.closeSession(session, "completed");
    return { transcript, verdict, session };
  }

  private async openSession(kind: SessionKind, participants: readonly string[], topic?: string): Promise<Session> {
    const now = Date.now();
    const session: Session = Object.freeze({
      id: uuidv4(),
      kind,
      participants: Object.freeze([...participants]),
      transcript: Object.freeze([]),
      round: 0,
      status: "running",
      ...(topic === undefined ? {} : { topic }),
      startedAt: now,
      updatedAt: now,
    });
    this.sessions.set(session.id, session);
    console.log(`[Orchestrator] Session ${session.id} started (${kind}, ${participants.join(" → ")})`);
    await this.report({ type: "session.started", session });
    return session;
  }

  private async recordTurn(
    session: Session,
    agentName: string,
    entries: readonly Message[],
    round: number
  ): Promise<Session> {
    const next: Session = Object.freeze({
      ...session,
      transcript: Object.freeze([...session.transcript, ...entries.map((entry) => withAuthor(entry, agentName))]),
      round,
      updatedAt: Date.now(),
    });
    this.sessions.set(next.id, next);
    await this.report({ type: "session.turn", session: next, agentName, entries });
    return next;
  }

  private async closeSession(session: Session, status: SessionStatus, error?: RunFailure): Promise<Session> {
    const closed: Session = Object.freeze({ ...session, status, updatedAt: Date.now() });
    this.sessions.delete(closed.id);
    console.log(`[Orchestrator] Session ${closed.id} ${status}`);
    await this.report(error ? { type: "session.finished", session: closed, error } : { type: "session.finished", session: closed });
    return closed;
  }

  private async report(event: SessionEvent): Promise<void> {
    if (!this.sink) {
      return;
    }
    try {
      await this.sink.record(event);
    } catch (error) {
      console.error(`[Orchestrator] Session sink failed on ${event.type}:`, error);
    }
  }
}
