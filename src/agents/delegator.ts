import { toAgentError } from "../protocol/errors";
import { agentMessage, outputText, userMessage } from "../protocol/message";
import type { AgentRegistry } from "../registry/agentRegistry";
import type { Router } from "../router/router";
import type { AgentContext, AgentHandler, AgentYield, Message } from "../types";

export const DEFAULT_MAX_DEPTH = 3;

export interface DelegatorOptions {
  router: Router;
  registry: AgentRegistry;
  /** Agent that plans, asks for calls and writes the answer. */
  planner: string;
  /** Agents the planner may call. Defaults to every registered agent but the planner and the delegator. */
  delegates?: readonly string[];
  /** Rounds of calls before the planner must answer. */
  maxDepth?: number;
}

export interface AgentCall {
  agent: string;
  task: string;
}

const CALL_PATTERN = /<call_agent>\s*agent:\s*([\w./-]+)\s*task:\s*([\s\S]*?)\s*<\/call_agent>/gi;

export function parseAgentCalls(text: string): AgentCall[] {
  return Array.from(text.matchAll(CALL_PATTERN), (match) => ({ agent: match[1] ?? "", task: match[2] ?? "" }));
}

export function stripAgentCalls(text: string): string {
  return text.replace(CALL_PATTERN, "").trim();
}

interface Delegate {
  name: string;
  description: string;
}

function instructions(delegates: readonly Delegate[]): string {
  const list = delegates.map((delegate) => `- ${delegate.name}: ${delegate.description}`).join("\n");
  return [
    "You can call other agents to help you complete the task below. You decide when their help is needed.",
    "",
    "Available agents:",
    list || "(none)",
    "",
    "To call an agent, use this exact format, one block per call:",
    "<call_agent>",
    "agent: agent_name",
    "task: specific task for that agent",
    "</call_agent>",
    "",
    "You will then receive their responses. When you need no more help, reply with your complete answer and no call blocks.",
  ].join("\n");
}

function resultsMessage(results: readonly string[], lastRound: boolean): Message {
  const closing = lastRound
    ? "No more agent calls are allowed. Provide your complete answer now."
    : "Now synthesize these into your final response. If you need more information, you can call more agents. Otherwise, provide your complete answer.";
  return userMessage(`Here are the responses from the agents you called:\n\n${results.join("\n\n")}\n\n${closing}`);
}

/**
 * Local agent that lets a planner agent call other agents. Each planner
 * reply is scanned for `<call_agent>` blocks; the calls go through the
 * router and their answers are fed back until the planner answers without
 * calls or `maxDepth` rounds have passed.
 */
export function createDelegatorAgent(options: DelegatorOptions): AgentHandler {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const delegatesFor = (self: string): Delegate[] => {
    const names = options.delegates ?? Array.from(options.registry.list(), (agent) => agent.name);
    return names
      .filter((name) => name !== self && name !== options.planner && options.registry.has(name))
      .map((name) => ({ name, description: options.registry.lookup(name).description ?? "" }));
  };

  const plan = async (conversation: readonly Message[], context: AgentContext): Promise<string> => {
    const result = await options.router.run(options.planner, conversation, { signal: context.signal });
    return outputText(result.output);
  };

  const dispatch = async (call: AgentCall, delegates: readonly Delegate[], context: AgentContext) => {
    const delegate = delegates.find((candidate) => candidate.name.toLowerCase() === call.agent.toLowerCase());
    if (!delegate) {
      const available = delegates.map((candidate) => candidate.name).join(", ");
      return { agent: call.agent, text: `[Error: Unknown agent '${call.agent}'. Available: ${available}]` };
    }
    try {
      const result = await options.router.run(delegate.name, [userMessage(call.task)], { signal: context.signal });
      return { agent: delegate.name, text: outputText(result.output) };
    } catch (error) {
      if (context.signal.aborted) {
        throw error;
      }
      return { agent: delegate.name, text: `[Error calling ${delegate.name}: ${toAgentError(error).message}]` };
    }
  };

  return async function* delegator(input, context): AsyncGenerator<AgentYield, void, undefined> {
    const delegates = delegatesFor(context.agentName);
    const conversation: Message[] = [userMessage(instructions(delegates)), ...input];

    for (let round = 1; round <= maxDepth; round++) {
      const reply = await plan(conversation, context);
      const calls = parseAgentCalls(reply);
      if (calls.length === 0) {
        yield reply;
        return;
      }

      console.log(`[${context.agentName}] Round ${round}: calling ${calls.map((call) => call.agent).join(", ")}`);
      const results: string[] = [];
      for (const call of calls) {
        yield { kind: "generic", data: { delegation: { round, agent: call.agent, task: call.task } } };
        const { agent, text } = await dispatch(call, delegates, context);
        results.push(`Response from ${agent} (task: ${call.task}):\n${text}`);
      }
      conversation.push(agentMessage(reply), resultsMessage(results, round === maxDepth));
    }

    console.warn(`[${context.agentName}] Max depth ${maxDepth} reached, asking for the final answer`);
    const answer = stripAgentCalls(await plan(conversation, context));
    yield answer || "[Max depth reached without a final answer]";
  };
}
