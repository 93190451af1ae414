export type Role = "user" | "agent";

export interface Part {
  readonly content: string;
  readonly mimeType?: string;
}

export interface Message {
  readonly role: Role;
  readonly parts: readonly Part[];
  /** Agent that produced this message, set on transcript entries. */
  readonly author?: string;
}

export type RunMode = "sync" | "stream";

export type RunState = "created" | "in-progress" | "completed" | "failed";

export type AgentErrorCode =
  | "AgentNotFound"
  | "DiscoveryFailed"
  | "BackendUnavailable"
  | "BackendError"
  | "Timeout"
  | "MalformedResponse"
  | "Cancelled"
  | "InvalidInput";

export interface RunFailure {
  readonly code: AgentErrorCode;
  readonly message: string;
}

export interface Run {
  readonly id: string;
  readonly agentName: string;
  readonly input: readonly Message[];
  readonly mode: RunMode;
  readonly state: RunState;
  readonly createdAt: number;
  readonly output?: readonly Message[];
  readonly error?: RunFailure;
}

export interface RunEventPayloads {
  "run.created": { run: Run };
  "run.in-progress": { run: Run };
  generic: Record<string, unknown>;
  "message.part": { messageIndex: number; part: Part };
  "message.completed": { messageIndex: number; message: Message };
  "run.completed": { run: Run; output: readonly Message[] };
  "run.failed": { run: Run; error: RunFailure };
}

export type RunEventType = keyof RunEventPayloads;

export type RunEvent = {
  [K in RunEventType]: {
    readonly runId: string;
    readonly sequence: number;
    readonly type: K;
    readonly payload: RunEventPayloads[K];
  };
}[RunEventType];

export type AgentKind = "local" | "remote";

export type RemoteProtocol = "acp" | "a2a";

export interface AgentContext {
  readonly runId: string;
  readonly agentName: string;
  readonly signal: AbortSignal;
}

export type AgentOutput = string | Message | readonly Message[];

export type AgentYield =
  | string
  | { readonly kind: "part"; readonly part: Part }
  | { readonly kind: "generic"; readonly data: Record<string, unknown> }
  | { readonly kind: "message"; readonly message?: Message };

/**
 * In-process agent capability. Returning an async iterable streams output;
 * anything else is treated as the complete output.
 */
export type AgentHandler = (
  input: readonly Message[],
  context: AgentContext
) => AgentOutput | Promise<AgentOutput> | AsyncIterable<AgentYield>;

interface DescriptorBase {
  readonly name: string;
  readonly capabilities: readonly string[];
  readonly description?: string;
  readonly inputContentTypes?: readonly string[];
  readonly outputContentTypes?: readonly string[];
}

export interface LocalAgentDescriptor extends DescriptorBase {
  readonly kind: "local";
  readonly handler: AgentHandler;
}

export interface RemoteAgentDescriptor extends DescriptorBase {
  readonly kind: "remote";
  readonly endpoint: string;
  readonly protocol: RemoteProtocol;
  /** Name the host knows the agent by; defaults to `name`. */
  readonly remoteName: string;
  readonly discoveredAt?: number;
}

export type AgentDescriptor = LocalAgentDescriptor | RemoteAgentDescriptor;

export type AgentStatus = "unknown" | "online" | "error" | "offline";

/** Outcome of the latest reachability check of an agent. */
export interface AgentHealth {
  readonly status: AgentStatus;
  readonly latencyMs?: number;
  readonly lastSeen?: number;
}

export interface RunResult {
  readonly run: Run;
  readonly output: readonly Message[];
}

export type SessionKind = "pipeline" | "debate";

export type SessionStatus = "running" | "completed" | "failed" | "cancelled";

export interface Session {
  readonly id: string;
  readonly kind: SessionKind;
  readonly participants: readonly string[];
  readonly transcript: readonly Message[];
  readonly round: number;
  readonly status: SessionStatus;
  readonly topic?: string;
  readonly startedAt: number;
  readonly updatedAt: number;
}
