import { Router, Request, Response } from "express";
import { toAgentDocument } from "../protocol/wire";
import type { AgentRegistry } from "../registry/agentRegistry";

export interface HostInfo {
  name: string;
  description: string;
}

/** Metadata for the agents this process hosts: the host manifest and per-agent documents. */
export function createDiscoveryRouter(registry: AgentRegistry, host: HostInfo): Router {
  const router = Router();

  const hostedDocuments = () => registry.find({ kind: "local" }).map(toAgentDocument);

  router.get("/.well-known/agent.json", (req: Request, res: Response) => {
    const agents = hostedDocuments();
    const capabilities = Array.from(new Set(agents.flatMap((agent) => agent.capabilities)));
    res.json({
      name: host.name,
      description: host.description,
      capabilities,
      input_content_types: ["text/plain"],
      output_content_types: ["text/plain"],
      agents,
    });
  });

  router.get("/ping", (req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  router.get("/agents", (req: Request, res: Response) => {
    res.json({ agents: hostedDocuments() });
  });

  router.get("/agents/:name", (req: Request, res: Response) => {
    const { name } = req.params;
    const agent = registry.find({ kind: "local" }).find((descriptor) => descriptor.name === name);
    if (!agent) {
      return res.status(404).json({ error: `Agent '${name}' is not hosted here` });
    }
    return res.json(toAgentDocument(agent));
  });

  return router;
}
