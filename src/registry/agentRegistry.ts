import { z } from "zod";
import { AgentError } from "../protocol/errors";
import { AgentDocumentSchema, HostManifestSchema, type AgentDocument } from "../protocol/wire";
import type {
  AgentDescriptor,
  AgentHandler,
  AgentHealth,
  AgentKind,
  AgentStatus,
  LocalAgentDescriptor,
  RemoteAgentDescriptor,
  RemoteProtocol,
} from "../types";
import { abortReason, createDeadline } from "../utils/abort";

export interface AgentFilter {
  capability?: string;
  kind?: AgentKind;
  status?: AgentStatus;
}

export interface AgentOptions {
  capabilities?: readonly string[];
  description?: string;
  inputContentTypes?: readonly string[];
  outputContentTypes?: readonly string[];
}

export interface RemoteAgentOptions extends AgentOptions {
  protocol?: RemoteProtocol;
  remoteName?: string;
}

export interface DiscoverOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_DISCOVERY_TIMEOUT_MS = 10_000;
const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

const UNKNOWN: AgentHealth = { status: "unknown" };

const A2ACardSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    capabilities: z.object({ streaming: z.boolean().optional() }).passthrough().optional(),
    skills: z.array(z.object({ id: z.string(), tags: z.array(z.string()).optional() }).passthrough()).optional(),
    defaultInputModes: z.array(z.string()).optional(),
    defaultOutputModes: z.array(z.string()).optional(),
  })
  .passthrough();

export function normalizeEndpoint(endpoint: string): string {
  return endpoint.replace(/\/+$/, "");
}

/** `host/agent` names address `agent` on its host. */
export function remoteNameOf(name: string): string {
  return name.slice(name.lastIndexOf("/") + 1);
}

function malformedMetadata(source: string, error: z.ZodError, document: unknown): AgentError {
  const fields = error.issues.map((issue) => issue.path.join(".") || "(root)").join(", ");
  return new AgentError("DiscoveryFailed", `Malformed agent metadata at ${source} (${fields})`, {
    details: document,
  });
}

function freezeLocal(descriptor: LocalAgentDescriptor): LocalAgentDescriptor {
  return Object.freeze({ ...descriptor, capabilities: Object.freeze([...descriptor.capabilities]) });
}

function freezeRemote(descriptor: RemoteAgentDescriptor): RemoteAgentDescriptor {
  return Object.freeze({
    ...descriptor,
    endpoint: normalizeEndpoint(descriptor.endpoint),
    capabilities: Object.freeze([...descriptor.capabilities]),
  });
}

/**
 * Name-keyed catalogue of agent backends.
 *
 * Entries are frozen and only ever replaced whole, so a reader holding a
 * descriptor never sees it change, and runs dispatched against an old entry
 * finish against that entry.
 */
export class AgentRegistry {
  private agents: Map<string, AgentDescriptor> = new Map();
  private health: Map<string, AgentHealth> = new Map();

  get size(): number {
    return this.agents.size;
  }

  /** Insert or replace the entry for `descriptor.name`. */
  register(descriptor: AgentDescriptor): AgentDescriptor {
    return descriptor.kind === "local" ? this.registerLocalDescriptor(descriptor) : this.registerRemoteDescriptor(descriptor);
  }

  registerLocal(name: string, handler: AgentHandler, options: AgentOptions = {}): LocalAgentDescriptor {
    return this.registerLocalDescriptor({
      name,
      kind: "local",
      handler,
      capabilities: options.capabilities ?? [],
      description: options.description,
      inputContentTypes: options.inputContentTypes,
      outputContentTypes: options.outputContentTypes,
    });
  }

  registerRemote(name: string, endpoint: string, options: RemoteAgentOptions = {}): RemoteAgentDescriptor {
    return this.registerRemoteDescriptor({
      name,
      kind: "remote",
      endpoint,
      protocol: options.protocol ?? "acp",
      remoteName: options.remoteName ?? remoteNameOf(name),
      capabilities: options.capabilities ?? [],
      description: options.description,
      inputContentTypes: options.inputContentTypes,
      outputContentTypes: options.outputContentTypes,
    });
  }

  unregister(name: string): boolean {
    const removed = this.agents.delete(name);
    this.health.delete(name);
    if (removed) {
      console.log(`[Registry] Removed: ${name}`);
    }
    return removed;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  lookup(name: string): AgentDescriptor {
    const descriptor = this.agents.get(name);
    if (!descriptor) {
      throw new AgentError("AgentNotFound", `Agent '${name}' is not registered`);
    }
    return descriptor;
  }

  /** Latest reachability of `name`. Local agents are always online. */
  healthOf(name: string): AgentHealth {
    this.lookup(name);
    return this.health.get(name) ?? UNKNOWN;
  }

  /**
   * Snapshot of the current entries. Iterating it again restarts from the
   * same snapshot; later registry changes are not reflected.
   */
  list(): Iterable<AgentDescriptor> {
    const snapshot = Array.from(this.agents.values());
    return {
      [Symbol.iterator]: () => snapshot.values(),
    };
  }

  find(filter: AgentFilter = {}): AgentDescriptor[] {
    return Array.from(this.list()).filter(
      (agent) =>
        (filter.capability === undefined || agent.capabilities.includes(filter.capability)) &&
        (filter.kind === undefined || agent.kind === filter.kind) &&
        (filter.status === undefined || (this.health.get(agent.name) ?? UNKNOWN).status === filter.status)
    );
  }

  /**
   * Fetch `{endpoint}/.well-known/agent.json` and register every agent it
   * describes as a remote agent at that endpoint.
   */
  async discover(endpoint: string, options: DiscoverOptions = {}): Promise<RemoteAgentDescriptor[]> {
    const base = normalizeEndpoint(endpoint);
    const started = Date.now();
    const document = await this.fetchDocument(`${base}/.well-known/agent.json`, options);
    const latencyMs = Date.now() - started;

    let entries: AgentDocument[];
    if (typeof document === "object" && document !== null && "agents" in document) {
      const manifest = HostManifestSchema.safeParse(document);
      if (!manifest.success) {
        throw malformedMetadata(base, manifest.error, document);
      }
      entries = manifest.data.agents;
    } else {
      const single = AgentDocumentSchema.safeParse(document);
      if (!single.success) {
        throw malformedMetadata(base, single.error, document);
      }
      entries = [single.data];
    }

    const discoveredAt = Date.now();
    const discovered = entries.map((entry) => {
      const descriptor = this.registerRemoteDescriptor({
        name: entry.name,
        kind: "remote",
        endpoint: base,
        protocol: "acp",
        remoteName: entry.name,
        capabilities: entry.capabilities,
        description: entry.description,
        inputContentTypes: entry.input_content_types,
        outputContentTypes: entry.output_content_types,
        discoveredAt,
      });
      this.health.set(descriptor.name, { status: "online", latencyMs, lastSeen: discoveredAt });
      return descriptor;
    });
    console.log(`[Registry] Discovered ${discovered.length} agent(s) at ${base}`);
    return discovered;
  }

  /** Register the agent published by an A2A agent card. */
  async discoverA2A(cardUrl: string, options: DiscoverOptions = {}): Promise<RemoteAgentDescriptor> {
    const started = Date.now();
    const document = await this.fetchDocument(cardUrl, options);
    const latencyMs = Date.now() - started;
    const card = A2ACardSchema.safeParse(document);
    if (!card.success) {
      throw malformedMetadata(cardUrl, card.error, document);
    }

    const capabilities = (card.data.skills ?? []).map((skill) => skill.id);
    if (card.data.capabilities?.streaming) {
      capabilities.push("streaming");
    }
    const discoveredAt = Date.now();
    const descriptor = this.registerRemoteDescriptor({
      name: card.data.name,
      kind: "remote",
      endpoint: cardUrl,
      protocol: "a2a",
      remoteName: card.data.name,
      capabilities,
      description: card.data.description,
      inputContentTypes: card.data.defaultInputModes,
      outputContentTypes: card.data.defaultOutputModes,
      discoveredAt,
    });
    this.health.set(descriptor.name, { status: "online", latencyMs, lastSeen: discoveredAt });
    return descriptor;
  }

  /**
   * Check whether `name` answers and record the outcome. ACP hosts are asked
   * for `{endpoint}/ping`, A2A agents for their card. A non-2xx answer marks
   * the agent `error`, no answer marks it `offline`; both keep the last
   * latency and sighting.
   */
  async probe(name: string, options: DiscoverOptions = {}): Promise<AgentHealth> {
    const descriptor = this.lookup(name);
    if (descriptor.kind === "local") {
      return this.healthOf(name);
    }

    const url = descriptor.protocol === "a2a" ? descriptor.endpoint : `${descriptor.endpoint}/ping`;
    const previous = this.health.get(name) ?? UNKNOWN;
    const deadline = createDeadline(options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS, options.signal);
    const started = Date.now();
    let health: AgentHealth;
    try {
      const response = await fetch(url, { signal: deadline.signal });
      await response.body?.cancel();
      health = response.ok
        ? { status: "online", latencyMs: Date.now() - started, lastSeen: Date.now() }
        : { ...previous, status: "error" };
    } catch (error) {
      if (options.signal?.aborted) {
        throw abortReason(options.signal);
      }
      console.warn(`[Registry] Probe of ${name} at ${url} failed:`, error instanceof Error ? error.message : error);
      health = { ...previous, status: "offline" };
    } finally {
      deadline.dispose();
    }

    if (this.agents.get(name) === descriptor) {
      this.health.set(name, health);
    }
    console.log(`[Registry] Probed ${name}: ${health.status}${health.status === "online" ? ` (${health.latencyMs}ms)` : ""}`);
    return health;
  }

  private registerLocalDescriptor(descriptor: LocalAgentDescriptor): LocalAgentDescriptor {
    const frozen = freezeLocal(descriptor);
    this.store(frozen, "LOCAL");
    return frozen;
  }

  private registerRemoteDescriptor(descriptor: RemoteAgentDescriptor): RemoteAgentDescriptor {
    const frozen = freezeRemote(descriptor);
    this.store(frozen, `${frozen.protocol.toUpperCase()} ${frozen.endpoint}`);
    return frozen;
  }

  private store(descriptor: AgentDescriptor, target: string): void {
    const replaced = this.agents.has(descriptor.name);
    this.agents.set(descriptor.name, descriptor);
    if (descriptor.kind === "local") {
      this.health.set(descriptor.name, { status: "online", latencyMs: 0 });
    } else {
      this.health.delete(descriptor.name);
    }
    console.log(`[Registry] ${replaced ? "Replaced" : "Registered"}: ${descriptor.name} → ${target}`);
  }

  private async fetchDocument(url: string, options: DiscoverOptions): Promise<unknown> {
    const deadline = createDeadline(options.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS, options.signal);
    try {
      console.log(`[Registry] Fetching agent metadata from: ${url}`);
      const response = await fetch(url, { signal: deadline.signal, headers: { Accept: "application/json" } });
      if (!response.ok) {
        await response.body?.cancel();
        throw new AgentError("DiscoveryFailed", `Failed to fetch agent metadata: ${response.status} ${response.statusText}`);
      }
      const text = await response.text();
      try {
        const document: unknown = JSON.parse(text);
        return document;
      } catch (error) {
        throw new AgentError("DiscoveryFailed", `Agent metadata at ${url} is not valid JSON`, {
          details: text,
          cause: error,
        });
      }
    } catch (error) {
      if (error instanceof AgentError) {
        throw error;
      }
      const reason = deadline.signal.aborted ? "request timed out or was cancelled" : String(error);
      throw new AgentError("DiscoveryFailed", `Could not reach ${url}: ${reason}`, { cause: error });
    } finally {
      deadline.dispose();
    }
  }
}
