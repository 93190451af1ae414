import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { AgentRegistry } from "../registry/agentRegistry";
import type { Router } from "../router/router";
import type { AgentHandler, LocalAgentDescriptor } from "../types";
import { createChatCompletionAgent } from "./chatCompletion";
import { createDelegatorAgent } from "./delegator";

const AgentDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  capabilities: z.array(z.string()).default([]),
  systemPrompt: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  stream: z.boolean().optional(),
  /** Makes this a delegating agent planned by the named agent. */
  planner: z.string().min(1).optional(),
  delegates: z.array(z.string()).optional(),
  maxDepth: z.number().int().positive().optional(),
});

const AgentsFileSchema = z.union([
  z.array(AgentDefinitionSchema),
  z.object({ agents: z.array(AgentDefinitionSchema) }).transform((file) => file.agents),
]);

export type AgentDefinition = z.infer<typeof AgentDefinitionSchema>;

export interface LlmSettings {
  apiUrl: string;
  model: string;
}

export function parseAgentDefinitions(raw: unknown, source: string): AgentDefinition[] {
  const parsed = AgentsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)").join(", ");
    throw new Error(`Invalid agent definitions in ${source} (${fields})`);
  }
  return parsed.data;
}

function handlerFor(definition: AgentDefinition, router: Router, registry: AgentRegistry, llm: LlmSettings): AgentHandler {
  if (definition.planner) {
    return createDelegatorAgent({
      router,
      registry,
      planner: definition.planner,
      delegates: definition.delegates,
      maxDepth: definition.maxDepth,
    });
  }
  return createChatCompletionAgent({
    apiUrl: llm.apiUrl,
    model: llm.model,
    systemPrompt: definition.systemPrompt,
    temperature: definition.temperature,
    maxTokens: definition.maxTokens,
    stream: definition.stream,
  });
}

/** Register a chat-completion agent, or a delegator where a planner is named, for every definition. */
export function registerAgentDefinitions(
  registry: AgentRegistry,
  router: Router,
  definitions: readonly AgentDefinition[],
  llm: LlmSettings
): LocalAgentDescriptor[] {
  return definitions.map((definition) =>
    registry.registerLocal(definition.name, handlerFor(definition, router, registry, llm), {
      capabilities: definition.stream ? [...definition.capabilities, "streaming"] : definition.capabilities,
      description: definition.description,
    })
  );
}

/** Read a JSON agents file (an array, or `{agents: [...]}`) and register its agents. */
export async function loadAgentsFile(
  path: string,
  registry: AgentRegistry,
  router: Router,
  llm: LlmSettings
): Promise<LocalAgentDescriptor[]> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Agents file ${path} is not valid JSON`, { cause: error });
  }
  const registered = registerAgentDefinitions(registry, router, parseAgentDefinitions(raw, path), llm);
  console.log(`[Agents] Loaded ${registered.length} agent(s) from ${path}`);
  return registered;
}
