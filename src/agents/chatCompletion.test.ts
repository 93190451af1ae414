import express from "express";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { agentMessage, messageText, userMessage } from "../protocol/message";
import { formatSseData } from "../protocol/sse";
import { AgentRegistry } from "../registry/agentRegistry";
import { Router } from "../router/router";
import { collect, listen, type TestServer } from "../testing/listen";
import { createChatCompletionAgent, stripThinking, ThinkingSplitter, toChatMessages } from "./chatCompletion";

describe("stripThinking", () => {
  it("keeps only the answer after a reasoning block", () => {
    expect(stripThinking("<think>weighing options</think>\n  Use tabs. ")).toBe("Use tabs.");
    expect(stripThinking(" plain ")).toBe("plain");
  });
});

describe("ThinkingSplitter", () => {
  it("holds back a tag split across chunks", () => {
    const splitter = new ThinkingSplitter();

    expect(splitter.push("<thi")).toEqual([]);
    expect(splitter.push("nk>plan</thi")).toEqual([{ kind: "generic", data: { thought: "plan" } }]);
    expect(splitter.push("nk> \n")).toEqual([]);
    expect(splitter.push("a b")).toEqual(["a b"]);
    expect(splitter.push("  ")).toEqual([]);
    expect(splitter.push("c")).toEqual(["  c"]);
    expect(splitter.flush()).toEqual([]);
  });

  it("passes text without reasoning through", () => {
    const splitter = new ThinkingSplitter();

    expect(splitter.push("2 < 3")).toEqual(["2 < 3"]);
    expect(splitter.push(" <t")).toEqual([]);
    expect(splitter.flush()).toEqual([" <t"]);
  });
});

describe("toChatMessages", () => {
  it("maps roles and joins parts with newlines", () => {
    expect(toChatMessages([userMessage(["a", "b"]), agentMessage("c")], "Be brief.")).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "a\nb" },
      { role: "assistant", content: "c" },
    ]);
  });
});

describe("createChatCompletionAgent", () => {
  let server: TestServer;
  const bodies: unknown[] = [];

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.post("/answer", (req, res) => {
      bodies.push(req.body);
      res.json({ choices: [{ message: { content: "<think>hmm</think> Answer" } }] });
    });
    app.post("/stream", (req, res) => {
      res.setHeader("Content-Type", "text/event-stream");
      res.write(formatSseData({ choices: [{ delta: { content: "Hel" } }] }));
      res.write(formatSseData({ choices: [{ delta: {} }] }));
      res.write(formatSseData({ choices: [{ delta: { content: "lo" } }] }));
      res.write("data: [DONE]\n\n");
      res.end();
    });
    app.post("/think", (req, res) => {
      res.setHeader("Content-Type", "text/event-stream");
      for (const content of ["<thi", "nk>plan", "</think>\n\nHel", "lo "]) {
        res.write(formatSseData({ choices: [{ delta: { content } }] }));
      }
      res.write("data: [DONE]\n\n");
      res.end();
    });
    app.post("/empty", (req, res) => {
      res.json({ choices: [{ message: { content: "" } }] });
    });
    app.post("/down", (req, res) => {
      res.status(503).send("overloaded");
    });
    app.post("/rejects", (req, res) => {
      res.status(500).send("nope");
    });
    server = await listen(app);
  });

  afterAll(async () => {
    await server.close();
  });

  function routerFor(path: string, stream = false): Router {
    const registry = new AgentRegistry();
    registry.registerLocal(
      "assistant",
      createChatCompletionAgent({ apiUrl: `${server.url}${path}`, model: "test-model", systemPrompt: "Be brief.", stream })
    );
    return new Router(registry);
  }

  it("sends the conversation and returns the cleaned reply", async () => {
    const result = await routerFor("/answer").run("assistant", [userMessage("Tabs or spaces?")]);

    expect(result.output.map(messageText)).toEqual(["Answer"]);
    expect(bodies[0]).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Tabs or spaces?" },
      ],
      max_tokens: 1500,
      temperature: 0.7,
      stream: false,
    });
  });

  it("yields streamed deltas as message parts", async () => {
    const events = await collect(routerFor("/stream", true).stream("assistant", [userMessage("hi")]));

    expect(events.map((event) => (event.type === "message.part" ? event.payload.part.content : event.type))).toEqual([
      "run.created",
      "run.in-progress",
      "Hel",
      "lo",
      "message.completed",
      "run.completed",
    ]);
  });

  it("reports streamed reasoning as generic events and keeps it out of the output", async () => {
    const events = await collect(routerFor("/think", true).stream("assistant", [userMessage("hi")]));

    expect(events.map((event) => (event.type === "message.part" ? event.payload.part.content : event.type))).toEqual([
      "run.created",
      "run.in-progress",
      "generic",
      "Hel",
      "lo",
      "message.completed",
      "run.completed",
    ]);
    expect(events[2]?.payload).toEqual({ thought: "plan" });
    const last = events[events.length - 1];
    expect(last?.type === "run.completed" && last.payload.output.map(messageText)).toEqual(["Hello"]);
  });

  it("classifies endpoint failures", async () => {
    const input = [userMessage("hi")];

    await expect(routerFor("/empty").run("assistant", input)).rejects.toMatchObject({
      code: "BackendError",
      message: "No text in API response",
    });
    await expect(routerFor("/down").run("assistant", input)).rejects.toMatchObject({
      code: "BackendUnavailable",
      message: "API request failed: 503 Service Unavailable - overloaded",
    });
    await expect(routerFor("/rejects").run("assistant", input)).rejects.toMatchObject({
      code: "BackendError",
      message: "API request failed: 500 Internal Server Error - nope",
    });
  });
});
