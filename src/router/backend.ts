import type { Message, RunEvent, RunResult } from "../types";

export interface BackendRequest {
  /** Registry name the caller used. */
  agentName: string;
  /** Name the backend knows the agent by. */
  remoteName: string;
  input: readonly Message[];
  signal: AbortSignal;
}

/** One way of reaching agents: in-process, over the run protocol, or over A2A. */
export interface AgentBackend {
  invoke(request: BackendRequest): Promise<RunResult>;
  invokeStream(request: BackendRequest): AsyncIterable<RunEvent>;
}
