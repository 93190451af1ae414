import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { AgentRegistry } from "../registry/agentRegistry";
import type { AgentDescriptor, AgentHealth } from "../types";

const DiscoverRequestSchema = z.object({
  endpoint: z.string().url(),
  protocol: z.enum(["acp", "a2a"]).default("acp"),
});

const isoTime = (time: number | undefined) => (time === undefined ? undefined : new Date(time).toISOString());

function toHealthEntry(health: AgentHealth) {
  return { status: health.status, latency_ms: health.latencyMs, last_seen: isoTime(health.lastSeen) };
}

function toRegistryEntry(descriptor: AgentDescriptor, health: AgentHealth) {
  const base = {
    name: descriptor.name,
    kind: descriptor.kind,
    description: descriptor.description ?? "",
    capabilities: [...descriptor.capabilities],
    ...toHealthEntry(health),
  };
  if (descriptor.kind === "local") {
    return base;
  }
  return {
    ...base,
    endpoint: descriptor.endpoint,
    protocol: descriptor.protocol,
    remote_name: descriptor.remoteName,
    discovered_at: isoTime(descriptor.discoveredAt),
  };
}

/** Inspect and manage the registry: list entries, discover remote hosts, probe and remove agents. */
export function createRegistryRouter(registry: AgentRegistry): Router {
  const router = Router();

  const entry = (descriptor: AgentDescriptor) => toRegistryEntry(descriptor, registry.healthOf(descriptor.name));

  router.get("/", (req: Request, res: Response) => {
    res.json({ agents: Array.from(registry.list(), entry) });
  });

  router.post("/discover", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = DiscoverRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "A valid endpoint URL is required", details: parsed.error.issues });
    }

    try {
      const { endpoint, protocol } = parsed.data;
      const discovered =
        protocol === "a2a" ? [await registry.discoverA2A(endpoint)] : await registry.discover(endpoint);
      return res.json({ success: true, agents: discovered.map(entry) });
    } catch (error) {
      return next(error);
    }
  });

  router.post("/:name/probe", async (req: Request, res: Response, next: NextFunction) => {
    const { name } = req.params;
    if (!registry.has(name)) {
      return res.status(404).json({ error: `Agent '${name}' is not registered` });
    }
    try {
      const health = await registry.probe(name);
      return res.json({ name, ...toHealthEntry(health) });
    } catch (error) {
      return next(error);
    }
  });

  router.delete("/:name", (req: Request, res: Response) => {
    const { name } = req.params;
    if (!registry.unregister(name)) {
      return res.status(404).json({ error: `Agent '${name}' is not registered` });
    }
    return res.json({ success: true });
  });

  return router;
}
