import { Router, Request, Response, NextFunction } from "express";
import { toAgentError } from "../protocol/errors";
import { formatSseData } from "../protocol/sse";
import { RunRequestSchema, toSyncResponse } from "../protocol/wire";
import type { Router as AgentRouter } from "../router/router";
import type { RunEvent } from "../types";
import { abortOnDisconnect } from "./connection";

/** `POST /runs`: execute one run, answering in full or as a server-sent event stream. */
export function createRunsRouter(agentRouter: AgentRouter): Router {
  const router = Router();

  router.post("/runs", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = RunRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid run request", details: parsed.error.issues });
    }
    const { agent_name: agentName, input, mode } = parsed.data;
    const signal = abortOnDisconnect(res);

    if (mode === "stream") {
      let events: AsyncIterable<RunEvent>;
      try {
        events = agentRouter.stream(agentName, input, { signal });
      } catch (error) {
        return next(error);
      }
      return streamRun(events, res, next);
    }

    try {
      const result = await agentRouter.run(agentName, input, { signal });
      return res.json(toSyncResponse(result));
    } catch (error) {
      const failure = toAgentError(error);
      if (failure.code === "AgentNotFound" || failure.code === "InvalidInput") {
        return next(failure);
      }
      if (signal.aborted) {
        return;
      }
      return res.json({ run_id: failure.runId, status: "failed", output: [], error: failure.toFailure() });
    }
  });

  return router;
}

async function streamRun(events: AsyncIterable<RunEvent>, res: Response, next: NextFunction): Promise<void> {
  const iterator = events[Symbol.asyncIterator]();
  try {
    const first = await iterator.next();
    if (first.done) {
      throw new Error("Run produced no events");
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.setHeader("Run-ID", first.value.runId);
    res.flushHeaders();
    res.write(formatSseData(first.value));

    for (let step = await iterator.next(); !step.done; step = await iterator.next()) {
      res.write(formatSseData(step.value));
    }
    res.end();
  } catch (error) {
    if (!res.headersSent) {
      next(error);
      return;
    }
    console.error("[Server] Run stream failed:", error);
    res.end();
  }
}
