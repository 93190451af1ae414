import express from "express";
import cors from "cors";
import { AgentError, OrchestrationError } from "./protocol/errors";
import type { Orchestrator } from "./orchestration/orchestrator";
import type { AgentRegistry } from "./registry/agentRegistry";
import type { Router as AgentRouter } from "./router/router";
import type { AgentErrorCode } from "./types";
import { createDiscoveryRouter, type HostInfo } from "./routes/discovery";
import { createRegistryRouter } from "./routes/registry";
import { createRunsRouter } from "./routes/runs";
import { createWorkflowsRouter } from "./routes/workflows";

export interface AppDependencies {
  registry: AgentRegistry;
  router: AgentRouter;
  orchestrator: Orchestrator;
  host: HostInfo;
  allowedOrigins: readonly string[];
}

const STATUS_BY_CODE: Record<AgentErrorCode, number> = {
  AgentNotFound: 404,
  InvalidInput: 400,
  DiscoveryFailed: 502,
  BackendUnavailable: 503,
  BackendError: 502,
  Timeout: 504,
  MalformedResponse: 502,
  Cancelled: 499,
};

function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

export function errorHandler(
  err: Error,
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
) {
  if (res.headersSent) {
    return next(err);
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: "Request body is not valid JSON" });
  }
  if (err instanceof OrchestrationError) {
    console.error(`[Server] Workflow failed: ${err.message}`);
    return res.status(STATUS_BY_CODE[err.code]).json({
      error: err.message,
      code: err.code,
      stage: err.stage,
      agent_name: err.agentName,
      session_id: err.session?.id,
    });
  }
  if (err instanceof AgentError) {
    console.error(`[Server] ${err.code}: ${err.message}`);
    return res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code, run_id: err.runId });
  }

  console.error("Error:", err);
  return res.status(500).json({
    error: err.message || "Internal server error",
  });
}

/** Express app serving the run protocol, registry management and workflows. */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin come from other agents and scripts
        if (!origin) return callback(null, true);
        if (deps.allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createDiscoveryRouter(deps.registry, deps.host));
  app.use(createRunsRouter(deps.router));
  app.use("/registry", createRegistryRouter(deps.registry));
  app.use("/workflows", createWorkflowsRouter(deps.orchestrator));

  app.use(errorHandler);

  return app;
}
