import { z } from "zod";
import { AgentError } from "../protocol/errors";
import { readSseData } from "../protocol/sse";
import type { AgentContext, AgentHandler, AgentYield, Message } from "../types";

export interface ChatCompletionOptions {
  apiUrl: string;
  model: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  /** Ask the endpoint for incremental output and yield it chunk by chunk. */
  stream?: boolean;
}

type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
        text: z.string().optional(),
      })
    )
    .min(1),
});

const ChatChunkSchema = z.object({
  choices: z.array(z.object({ delta: z.object({ content: z.string().nullish() }).optional() })),
});

const TRANSIENT_STATUS = new Set([429, 502, 503, 504]);

/** Drop a leading reasoning block some models emit before the answer. */
export function stripThinking(text: string): string {
  const end = text.lastIndexOf("</think>");
  return (end === -1 ? text : text.slice(end + "</think>".length)).trim();
}

const OPEN_THINK = "<think>";
const CLOSE_THINK = "</think>";

function partialTagLength(text: string, tag: string): number {
  for (let length = Math.min(tag.length - 1, text.length); length > 0; length--) {
    if (tag.startsWith(text.slice(-length))) {
      return length;
    }
  }
  return 0;
}

/**
 * Splits streamed completion text into reasoning and answer. Reasoning comes
 * out as `{ thought }` generic data, the answer as parts with its leading and
 * trailing whitespace dropped. Tags may arrive split across chunks.
 */
export class ThinkingSplitter {
  private buffer = "";
  private thinking = false;
  private answering = false;
  private heldWhitespace = "";

  push(chunk: string): AgentYield[] {
    this.buffer += chunk;
    const out: AgentYield[] = [];
    for (;;) {
      const tag = this.thinking ? CLOSE_THINK : OPEN_THINK;
      const index = this.buffer.indexOf(tag);
      if (index === -1) {
        const keep = partialTagLength(this.buffer, tag);
        this.emit(this.buffer.slice(0, this.buffer.length - keep), out);
        this.buffer = this.buffer.slice(this.buffer.length - keep);
        return out;
      }
      this.emit(this.buffer.slice(0, index), out);
      this.buffer = this.buffer.slice(index + tag.length);
      this.thinking = !this.thinking;
    }
  }

  flush(): AgentYield[] {
    const out: AgentYield[] = [];
    this.emit(this.buffer, out);
    this.buffer = "";
    return out;
  }

  private emit(text: string, out: AgentYield[]): void {
    if (this.thinking) {
      if (text) {
        out.push({ kind: "generic", data: { thought: text } });
      }
      return;
    }
    const answer = this.answering ? text : text.trimStart();
    const body = answer.trimEnd();
    if (!body) {
      this.heldWhitespace += answer;
      return;
    }
    out.push(this.heldWhitespace + body);
    this.heldWhitespace = answer.slice(body.length);
    this.answering = true;
  }
}

export function toChatMessages(input: readonly Message[], systemPrompt?: string): ChatMessage[] {
  const messages: ChatMessage[] = systemPrompt ? [{ role: "system", content: systemPrompt }] : [];
  for (const message of input) {
    messages.push({
      role: message.role === "agent" ? "assistant" : "user",
      content: message.parts.map((part) => part.content).join("\n"),
    });
  }
  return messages;
}

async function requestCompletion(
  options: ChatCompletionOptions,
  input: readonly Message[],
  context: AgentContext,
  stream: boolean
): Promise<Response> {
  const requestBody = {
    model: options.model,
    messages: toChatMessages(input, options.systemPrompt),
    max_tokens: options.maxTokens ?? 1500,
    temperature: options.temperature ?? 0.7,
    stream,
  };

  let response: Response;
  try {
    response = await fetch(options.apiUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(requestBody),
      signal: context.signal,
    });
  } catch (error) {
    throw new AgentError("BackendUnavailable", `LLM API unreachable at ${options.apiUrl}`, { cause: error });
  }

  if (!response.ok) {
    const errorBody = await response.text();
    const code = TRANSIENT_STATUS.has(response.status) ? "BackendUnavailable" : "BackendError";
    throw new AgentError(code, `API request failed: ${response.status} ${response.statusText} - ${errorBody}`);
  }
  return response;
}

async function complete(options: ChatCompletionOptions, input: readonly Message[], context: AgentContext): Promise<string> {
  const response = await requestCompletion(options, input, context, false);
  const parsed = ChatCompletionSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new AgentError("MalformedResponse", "Unexpected chat completion response", { details: parsed.error.issues });
  }

  const [choice] = parsed.data.choices;
  const text = stripThinking(choice?.message?.content ?? choice?.text ?? "");
  if (!text) {
    throw new AgentError("BackendError", "No text in API response");
  }
  return text;
}

function parseChunk(data: string): unknown {
  try {
    const value: unknown = JSON.parse(data);
    return value;
  } catch (error) {
    throw new AgentError("MalformedResponse", "Chat completion chunk is not valid JSON", { details: data, cause: error });
  }
}

async function* completeIncrementally(
  options: ChatCompletionOptions,
  input: readonly Message[],
  context: AgentContext
): AsyncGenerator<AgentYield, void, undefined> {
  const response = await requestCompletion(options, input, context, true);
  if (!response.body) {
    throw new AgentError("MalformedResponse", "Chat completion stream has no body");
  }
  const splitter = new ThinkingSplitter();
  for await (const data of readSseData(response.body)) {
    if (data === "[DONE]") {
      break;
    }
    const chunk = ChatChunkSchema.safeParse(parseChunk(data));
    if (!chunk.success) {
      throw new AgentError("MalformedResponse", "Unexpected chat completion chunk", { details: data });
    }
    const content = chunk.data.choices[0]?.delta?.content;
    if (content) {
      yield* splitter.push(content);
    }
  }
  yield* splitter.flush();
}

/**
 * Local agent backed by an OpenAI-compatible `/chat/completions` endpoint.
 * Input messages become the conversation; the reply is the agent's output.
 */
export function createChatCompletionAgent(options: ChatCompletionOptions): AgentHandler {
  return (input, context) => {
    console.log(`[${context.agentName}] Requesting completion from ${options.model}`);
    if (options.stream) {
      return completeIncrementally(options, input, context);
    }
    return complete(options, input, context).then((text) => {
      console.log(`[${context.agentName}] Responded with ${text.length} chars`);
      return text;
    });
  };
}
