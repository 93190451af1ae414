import { collectResult } from "../protocol/events";
import { executeHandler } from "../protocol/execute";
import type { AgentHandler, RunEvent, RunResult } from "../types";
import type { AgentBackend, BackendRequest } from "./backend";

/** In-process agent, run through the same executor the host serves runs with. */
export class LocalCapability implements AgentBackend {
  constructor(private readonly handler: AgentHandler) {}

  invoke(request: BackendRequest): Promise<RunResult> {
    return collectResult(
      executeHandler(request.agentName, this.handler, request.input, { mode: "sync", signal: request.signal })
    );
  }

  invokeStream(request: BackendRequest): AsyncIterable<RunEvent> {
    return executeHandler(request.agentName, this.handler, request.input, { mode: "stream", signal: request.signal });
  }
}
