import { z } from "zod";
import type { AgentDescriptor, AgentErrorCode, Message, Role, RunEvent, RunFailure, RunResult } from "../types";
import { createMessage } from "./message";

const ERROR_CODES = [
  "AgentNotFound",
  "DiscoveryFailed",
  "BackendUnavailable",
  "BackendError",
  "Timeout",
  "MalformedResponse",
  "Cancelled",
  "InvalidInput",
] as const satisfies readonly AgentErrorCode[];

function isErrorCode(value: string): value is AgentErrorCode {
  return ERROR_CODES.some((code) => code === value);
}

// Codes from other implementations collapse into BackendError.
const ErrorCodeSchema = z.string().transform((code): AgentErrorCode => (isErrorCode(code) ? code : "BackendError"));

const FailureSchema = z.object({ code: ErrorCodeSchema, message: z.string() });

const WirePartSchema = z.object({
  content: z.string(),
  content_type: z.string().optional(),
});

const wireMessage = (defaultRole: Role) =>
  z
    .object({
      role: z.enum(["user", "agent"]).default(defaultRole),
      parts: z.array(WirePartSchema).min(1),
    })
    .transform((message) =>
      createMessage(
        message.role,
        message.parts.map((part) => ({ content: part.content, mimeType: part.content_type }))
      )
    );

/** Run input as sent by callers; messages without a role are user messages. */
export const WireMessageSchema = wireMessage("user");

const WireOutputMessageSchema = wireMessage("agent");

export type WireMessage = z.input<typeof WireMessageSchema>;

export const RunRequestSchema = z.object({
  agent_name: z.string().min(1),
  input: z.array(WireMessageSchema).min(1),
  mode: z.enum(["sync", "stream"]).default("sync"),
});

export type RunRequestBody = z.input<typeof RunRequestSchema>;

export const SyncRunResponseSchema = z.object({
  run_id: z.string().optional(),
  status: z.enum(["completed", "failed"]),
  output: z.array(WireOutputMessageSchema).default([]),
  error: z.union([FailureSchema, z.string()]).nullish(),
});

export type SyncRunResponse = z.input<typeof SyncRunResponseSchema>;

export const AgentDocumentSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    capabilities: z.array(z.string()),
    input_content_types: z.array(z.string()).optional(),
    output_content_types: z.array(z.string()).optional(),
  })
  .passthrough();

export type AgentDocument = z.infer<typeof AgentDocumentSchema>;

/** A host manifest listing every agent served at one endpoint. */
export const HostManifestSchema = z.object({ agents: z.array(AgentDocumentSchema) }).passthrough();

// Internal message shape as it appears inside event payloads.
const EventMessageSchema = z
  .object({
    role: z.enum(["user", "agent"]),
    parts: z.array(z.object({ content: z.string(), mimeType: z.string().optional() })).min(1),
    author: z.string().optional(),
  })
  .transform((message) => createMessage(message.role, message.parts, message.author));

const RunSchema = z.object({
  id: z.string(),
  agentName: z.string(),
  input: z.array(EventMessageSchema),
  mode: z.enum(["sync", "stream"]),
  state: z.enum(["created", "in-progress", "completed", "failed"]),
  createdAt: z.number(),
  output: z.array(EventMessageSchema).optional(),
  error: FailureSchema.optional(),
});

const EventBase = {
  runId: z.string().min(1),
  sequence: z.number().int().nonnegative(),
};

export const RunEventSchema = z.discriminatedUnion("type", [
  z.object({ ...EventBase, type: z.literal("run.created"), payload: z.object({ run: RunSchema }) }),
  z.object({ ...EventBase, type: z.literal("run.in-progress"), payload: z.object({ run: RunSchema }) }),
  z.object({ ...EventBase, type: z.literal("generic"), payload: z.record(z.unknown()) }),
  z.object({
    ...EventBase,
    type: z.literal("message.part"),
    payload: z.object({
      messageIndex: z.number().int().nonnegative(),
      part: z.object({ content: z.string(), mimeType: z.string().optional() }),
    }),
  }),
  z.object({
    ...EventBase,
    type: z.literal("message.completed"),
    payload: z.object({ messageIndex: z.number().int().nonnegative(), message: EventMessageSchema }),
  }),
  z.object({
    ...EventBase,
    type: z.literal("run.completed"),
    payload: z.object({ run: RunSchema, output: z.array(EventMessageSchema) }),
  }),
  z.object({ ...EventBase, type: z.literal("run.failed"), payload: z.object({ run: RunSchema, error: FailureSchema }) }),
]);

export function parseRunEvent(raw: unknown): RunEvent | undefined {
  const parsed = RunEventSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  const event: RunEvent = parsed.data;
  return Object.freeze(event);
}

export function toWireMessage(message: Message): WireMessage {
  return {
    role: message.role,
    parts: message.parts.map((part) =>
      part.mimeType === undefined ? { content: part.content } : { content: part.content, content_type: part.mimeType }
    ),
  };
}

export function toSyncResponse(result: RunResult): SyncRunResponse {
  const { run } = result;
  return {
    run_id: run.id,
    status: run.state === "completed" ? "completed" : "failed",
    output: result.output.map(toWireMessage),
    ...(run.error ? { error: run.error } : {}),
  };
}

export function failureFromResponse(error: RunFailure | string | null | undefined): RunFailure {
  if (typeof error === "string") {
    return { code: "BackendError", message: error };
  }
  return error ?? { code: "BackendError", message: "Remote run failed without a reason" };
}

export function toAgentDocument(descriptor: AgentDescriptor): AgentDocument {
  return {
    name: descriptor.name,
    description: descriptor.description ?? "",
    capabilities: [...descriptor.capabilities],
    input_content_types: [...(descriptor.inputContentTypes ?? ["text/plain"])],
    output_content_types: [...(descriptor.outputContentTypes ?? ["text/plain"])],
  };
}
