import { createApp } from "./app";
import { loadAgentsFile } from "./agents/agentsFile";
import { loadConfig, type AppConfig } from "./config";
import { Orchestrator } from "./orchestration/orchestrator";
import { RedisSessionSink } from "./orchestration/redisSessionSink";
import { AgentRegistry } from "./registry/agentRegistry";
import { Router } from "./router/router";

async function initialize(config: AppConfig) {
  const registry = new AgentRegistry();
  const router = new Router(registry, { timeoutMs: config.router.timeoutMs, retry: config.router.retry });

  if (config.agentsFile && config.llm) {
    await loadAgentsFile(config.agentsFile, registry, router, config.llm);
  } else {
    console.log("ℹ️  No AGENTS_FILE configured, hosting no local agents");
  }

  let sink: RedisSessionSink | undefined;
  if (config.redisUrl) {
    sink = await RedisSessionSink.connect(config.redisUrl);
    console.log("✅ Session sink: Redis");
  }

  const orchestrator = new Orchestrator(router, { concurrency: config.fanOutConcurrency, sink });
  console.log("✅ Router and orchestrator initialized");

  return { registry, router, orchestrator, sink };
}

async function main() {
  const config = loadConfig();
  const { registry, router, orchestrator, sink } = await initialize(config);

  const app = createApp({
    registry,
    router,
    orchestrator,
    host: { name: config.hostName, description: config.hostDescription },
    allowedOrigins: config.allowedOrigins,
  });

  const PORT = config.port;
  const server = app.listen(PORT, () => {
    console.log(`\n🚀 Agent relay running on http://localhost:${PORT}`);
    console.log(`📡 API endpoints:`);
    console.log(`   - GET    http://localhost:${PORT}/.well-known/agent.json`);
    console.log(`   - GET    http://localhost:${PORT}/agents`);
    console.log(`   - POST   http://localhost:${PORT}/runs`);
    console.log(`   - GET    http://localhost:${PORT}/registry`);
    console.log(`   - POST   http://localhost:${PORT}/registry/discover`);
    console.log(`   - POST   http://localhost:${PORT}/registry/:name/probe`);
    console.log(`   - POST   http://localhost:${PORT}/workflows/fan-out`);
    console.log(`   - POST   http://localhost:${PORT}/workflows/pipeline`);
    console.log(`   - POST   http://localhost:${PORT}/workflows/debate`);
    console.log(`   - GET    http://localhost:${PORT}/api/health`);
    console.log(`\n🌍 Allowed origins: ${config.allowedOrigins.join(", ")}\n`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down`);
    router.close();
    server.close();
    sink?.close().catch((error: unknown) => {
      console.error("[Server] Failed to close Redis:", error);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Failed to initialize server:", error);
  process.exit(1);
});
