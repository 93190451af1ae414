import type { Message, Part, Role } from "../types";
import { AgentError } from "./errors";

export function createPart(content: string, mimeType?: string): Part {
  return Object.freeze(mimeType === undefined ? { content } : { content, mimeType });
}

/**
 * Build an immutable message. Strings become plain-text parts.
 * Throws InvalidInput when no parts are given.
 */
export function createMessage(
  role: Role,
  parts: string | ReadonlyArray<string | Part>,
  author?: string
): Message {
  const list = typeof parts === "string" ? [parts] : parts;
  if (list.length === 0) {
    throw new AgentError("InvalidInput", "A message needs at least one part");
  }
  const frozenParts = Object.freeze(
    list.map((part) => (typeof part === "string" ? createPart(part) : createPart(part.content, part.mimeType)))
  );
  return Object.freeze(author === undefined ? { role, parts: frozenParts } : { role, parts: frozenParts, author });
}

export function userMessage(content: string | ReadonlyArray<string | Part>): Message {
  return createMessage("user", content);
}

export function agentMessage(content: string | ReadonlyArray<string | Part>, author?: string): Message {
  return createMessage("agent", content, author);
}

/** Re-tag a message with the agent that produced it. */
export function withAuthor(message: Message, author: string): Message {
  return createMessage(message.role, message.parts, author);
}

export function messageText(message: Message): string {
  return message.parts.map((part) => part.content).join("");
}

export function outputText(messages: readonly Message[]): string {
  return messages.map(messageText).join("\n");
}

export function assertValidInput(input: readonly Message[]): void {
  if (input.length === 0) {
    throw new AgentError("InvalidInput", "Input must contain at least one message");
  }
  input.forEach((message, index) => {
    if (message.parts.length === 0) {
      throw new AgentError("InvalidInput", `Input message ${index} has no parts`);
    }
  });
}
