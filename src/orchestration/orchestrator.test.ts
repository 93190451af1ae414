import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { OrchestrationError } from "../protocol/errors";
import { messageText, outputText, userMessage } from "../protocol/message";
import { AgentRegistry } from "../registry/agentRegistry";
import { Router } from "../router/router";
import type { AgentHandler, Message } from "../types";
import { Orchestrator } from "./orchestrator";
import { MemorySessionSink } from "./sessionSink";

const input = [userMessage("go")];

function after(ms: number, text: string): AgentHandler {
  return async () => {
    await delay(ms);
    return text;
  };
}

function untilAborted(onAbort: () => void = () => undefined): AgentHandler {
  return (_input, context) =>
    new Promise<string>((resolve) => {
      context.signal.addEventListener(
        "abort",
        () => {
          onAbort();
          resolve("cancelled");
        },
        { once: true }
      );
    });
}

const broken: AgentHandler = () => {
  throw new Error("broken on purpose");
};

function texts(messages: readonly Message[] | undefined): string[] {
  return (messages ?? []).map(messageText);
}

function setup(register: (registry: AgentRegistry) => void, sink?: MemorySessionSink) {
  const registry = new AgentRegistry();
  register(registry);
  const router = new Router(registry);
  return { router, orchestrator: new Orchestrator(router, { sink }) };
}

describe("Orchestrator.fanOut", () => {
  it("reports results in request order whatever order they finish in", async () => {
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("slow", after(30, "slow"));
      registry.registerLocal("medium", after(15, "medium"));
      registry.registerLocal("fast", after(1, "fast"));
    });

    const report = await orchestrator.fanOut([
      { agentName: "slow", input },
      { agentName: "medium", input },
      { agentName: "fast", input },
    ]);

    expect(report.status).toBe("completed");
    expect(report.results.map((result) => [result.index, result.agentName, result.ok])).toEqual([
      [0, "slow", true],
      [1, "medium", true],
      [2, "fast", true],
    ]);
    expect(report.results.map((result) => (result.ok ? outputText(result.output) : ""))).toEqual([
      "slow",
      "medium",
      "fast",
    ]);
  });

  it("cancels the siblings on both sides of a failing branch under fail-fast", async () => {
    const aborted = { first: false, last: false };
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("first", untilAborted(() => (aborted.first = true)));
      registry.registerLocal("broken", async () => {
        await delay(5);
        throw new Error("branch two failed");
      });
      registry.registerLocal("last", untilAborted(() => (aborted.last = true)));
    });

    await expect(
      orchestrator.fanOut([
        { agentName: "first", input },
        { agentName: "broken", input },
        { agentName: "last", input },
      ])
    ).rejects.toMatchObject({ code: "BackendError", message: "branch two failed" });
    expect(aborted).toEqual({ first: true, last: true });
  });

  it("never starts queued branches once fail-fast has cancelled", async () => {
    let started = 0;
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("broken", broken);
      registry.registerLocal("counted", () => {
        started += 1;
        return "ran";
      });
    });

    await expect(
      orchestrator.fanOut(
        [
          { agentName: "broken", input },
          { agentName: "counted", input },
          { agentName: "counted", input },
        ],
        { concurrency: 1 }
      )
    ).rejects.toMatchObject({ code: "BackendError" });
    expect(started).toBe(0);
  });

  it("keeps going under best-effort and classifies the outcome", async () => {
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("ok", after(1, "fine"));
      registry.registerLocal("broken", broken);
    });

    const partial = await orchestrator.fanOut(
      [
        { agentName: "ok", input },
        { agentName: "broken", input },
        { agentName: "ok", input },
      ],
      { policy: "best-effort" }
    );
    expect(partial.status).toBe("partial-failure");
    expect(partial.results.map((result) => (result.ok ? outputText(result.output) : result.error.message))).toEqual([
      "fine",
      "broken on purpose",
      "fine",
    ]);

    const failed = await orchestrator.fanOut(
      [
        { agentName: "broken", input },
        { agentName: "missing", input },
      ],
      { policy: "best-effort" }
    );
    expect(failed.status).toBe("failed");
    expect(failed.results.map((result) => (result.ok ? "ok" : result.error.code))).toEqual([
      "BackendError",
      "AgentNotFound",
    ]);
  });
});

describe("Orchestrator.pipeline", () => {
  const register = (registry: AgentRegistry) => {
    registry.registerLocal("upper", (messages) => outputText(messages).toUpperCase());
    registry.registerLocal("exclaim", (messages) => `${outputText(messages)}!`);
    registry.registerLocal("broken", broken);
  };

  it("matches calling each stage by hand", async () => {
    const sink = new MemorySessionSink();
    const { router, orchestrator } = setup(register, sink);

    const piped = await orchestrator.pipeline(["upper", "exclaim"], [userMessage("hello")]);
    const first = await router.run("upper", [userMessage("hello")]);
    const manual = await router.run("exclaim", first.output);

    expect(piped.output).toEqual(manual.output);
    expect(texts(piped.output)).toEqual(["HELLO!"]);
    expect(piped.stages.map((run) => run.agentName)).toEqual(["upper", "exclaim"]);
    expect(piped.session.status).toBe("completed");
    expect(piped.session.transcript.map((entry) => entry.author)).toEqual(["upper", "exclaim"]);
    expect(sink.events.map((event) => event.type)).toEqual([
      "session.started",
      "session.turn",
      "session.turn",
      "session.finished",
    ]);
    expect(orchestrator.activeSessions()).toEqual([]);
  });

  it("stops at the failing stage and says which one", async () => {
    const { orchestrator } = setup(register);

    const failure = await orchestrator.pipeline(["upper", "broken", "exclaim"], input).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(OrchestrationError);
    expect(failure).toMatchObject({
      code: "BackendError",
      message: "Pipeline stage 1 (broken) failed: broken on purpose",
      stage: 1,
      agentName: "broken",
    });
    expect(failure instanceof OrchestrationError && failure.session?.status).toBe("failed");
    expect(failure instanceof OrchestrationError && texts(failure.session?.transcript)).toEqual(["GO"]);
  });

  it("rejects an empty stage list", async () => {
    const { orchestrator } = setup(register);

    await expect(orchestrator.pipeline([], input)).rejects.toMatchObject({ code: "InvalidInput" });
  });
});

describe("Orchestrator.debate", () => {
  function speaker(name: string, seen: Message[][]): AgentHandler {
    let turns = 0;
    return (messages) => {
      seen.push([...messages]);
      turns += 1;
      return `${name}${turns}`;
    };
  }

  it("alternates speakers for every round and lets the synthesizer close", async () => {
    const seenByQ: Message[][] = [];
    const seenByJudge: Message[][] = [];
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("P", speaker("P", []));
      registry.registerLocal("Q", speaker("Q", seenByQ));
      registry.registerLocal("judge", speaker("verdict", seenByJudge));
    });

    const result = await orchestrator.debate({ topic: "tabs", participants: ["P", "Q"], rounds: 2, synthesizer: "judge" });

    expect(result.transcript.map((entry) => entry.author)).toEqual(["P", "Q", "P", "Q"]);
    expect(texts(result.transcript)).toEqual(["P1", "Q1", "P2", "Q2"]);
    expect(texts(result.verdict)).toEqual(["verdict1"]);
    expect(result.verdict?.[0]?.author).toBe("judge");
    expect(result.session.status).toBe("completed");
    expect(result.session.round).toBe(2);

    expect(seenByQ[0]?.[0]?.parts.map((part) => part.content)).toEqual([
      "DEBATE TOPIC: tabs",
      "CONVERSATION SO FAR:",
      "P: P1",
      "Now respond as Q (round 1 of 2). Address specific points made by others.",
    ]);
    expect(seenByJudge[0]?.[0]?.parts.map((part) => part.content)).toEqual([
      "DEBATE TOPIC: tabs",
      "CONVERSATION SO FAR:",
      "P: P1",
      "Q: Q1",
      "P: P2",
      "Q: Q2",
      "You are judge. Weigh the arguments above and deliver a final verdict.",
    ]);
  });

  it("tells the first speaker that it opens the debate", async () => {
    const seenByP: Message[][] = [];
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("P", speaker("P", seenByP));
    });

    await orchestrator.debate({ topic: "tabs", participants: ["P"], rounds: 1 });

    expect(seenByP[0]?.[0]?.parts.map((part) => part.content)).toEqual([
      "DEBATE TOPIC: tabs",
      "You are P and you speak first (round 1 of 1).",
    ]);
  });

  it("validates participants and rounds", async () => {
    const { orchestrator } = setup(() => undefined);

    await expect(orchestrator.debate({ topic: "t", participants: [], rounds: 1 })).rejects.toMatchObject({
      code: "InvalidInput",
    });
    await expect(orchestrator.debate({ topic: "t", participants: ["P"], rounds: 0 })).rejects.toMatchObject({
      code: "InvalidInput",
      message: "Rounds must be a positive integer, got 0",
    });
  });

  it("marks the session cancelled when the caller aborts", async () => {
    const sink = new MemorySessionSink();
    const { orchestrator } = setup((registry) => {
      registry.registerLocal("P", untilAborted());
    }, sink);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const failure = await orchestrator
      .debate({ topic: "t", participants: ["P"], rounds: 3, signal: controller.signal })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(OrchestrationError);
    expect(failure).toMatchObject({ code: "Cancelled", agentName: "P" });
    expect(failure instanceof OrchestrationError && failure.session?.status).toBe("cancelled");
    const finished = sink.events[sink.events.length - 1];
    expect(finished?.type === "session.finished" && finished.error?.code).toBe("Cancelled");
  });
});
