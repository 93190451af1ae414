import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { messageText, userMessage } from "../protocol/message";
import { toWireMessage, WireMessageSchema } from "../protocol/wire";
import type { BranchResult, Orchestrator } from "../orchestration/orchestrator";
import type { Message } from "../types";
import { abortOnDisconnect } from "./connection";

// Plain text becomes a single user message.
const InputSchema = z.union([
  z
    .string()
    .min(1)
    .transform((text) => [userMessage(text)]),
  z.array(WireMessageSchema).min(1),
]);

const FanOutRequestSchema = z.object({
  branches: z.array(z.object({ agent_name: z.string().min(1), input: InputSchema })).min(1),
  policy: z.enum(["fail-fast", "best-effort"]).default("fail-fast"),
  concurrency: z.number().int().positive().optional(),
  timeout_ms: z.number().int().positive().optional(),
});

const PipelineRequestSchema = z.object({
  agents: z.array(z.string().min(1)).min(1),
  input: InputSchema,
  timeout_ms: z.number().int().positive().optional(),
});

const DebateRequestSchema = z.object({
  topic: z.string().min(1),
  participants: z.array(z.string().min(1)).min(1),
  rounds: z.number().int().positive().max(20).default(2),
  synthesizer: z.string().min(1).optional(),
  timeout_ms: z.number().int().positive().optional(),
});

function toTranscriptEntry(message: Message) {
  return { author: message.author ?? message.role, text: messageText(message) };
}

function toBranchEntry(result: BranchResult) {
  if (result.ok) {
    return {
      index: result.index,
      agent_name: result.agentName,
      ok: true,
      run_id: result.run.id,
      output: result.output.map(toWireMessage),
    };
  }
  return {
    index: result.index,
    agent_name: result.agentName,
    ok: false,
    run_id: result.error.runId,
    error: result.error.toFailure(),
  };
}

function invalid(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: "Invalid workflow request", details: error.issues });
}

/** Fan-out, pipeline and debate workflows over HTTP. */
export function createWorkflowsRouter(orchestrator: Orchestrator): Router {
  const router = Router();

  router.post("/fan-out", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = FanOutRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return invalid(res, parsed.error);
    }
    try {
      const { branches, policy, concurrency, timeout_ms: timeoutMs } = parsed.data;
      const report = await orchestrator.fanOut(
        branches.map((branch) => ({ agentName: branch.agent_name, input: branch.input })),
        { policy, concurrency, timeoutMs, signal: abortOnDisconnect(res) }
      );
      return res.json({ status: report.status, results: report.results.map(toBranchEntry) });
    } catch (error) {
      return next(error);
    }
  });

  router.post("/pipeline", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = PipelineRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return invalid(res, parsed.error);
    }
    try {
      const { agents, input, timeout_ms: timeoutMs } = parsed.data;
      const result = await orchestrator.pipeline(agents, input, { timeoutMs, signal: abortOnDisconnect(res) });
      return res.json({
        session_id: result.session.id,
        output: result.output.map(toWireMessage),
        stages: result.stages.map((run) => ({ agent_name: run.agentName, run_id: run.id })),
      });
    } catch (error) {
      return next(error);
    }
  });

  router.post("/debate", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = DebateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return invalid(res, parsed.error);
    }
    try {
      const { topic, participants, rounds, synthesizer, timeout_ms: timeoutMs } = parsed.data;
      const result = await orchestrator.debate({
        topic,
        participants,
        rounds,
        synthesizer,
        timeoutMs,
        signal: abortOnDisconnect(res),
      });
      return res.json({
        session_id: result.session.id,
        topic,
        transcript: result.transcript.map(toTranscriptEntry),
        verdict: result.verdict?.map(toTranscriptEntry),
      });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
