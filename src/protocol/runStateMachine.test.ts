import { describe, expect, it } from "vitest";
import { createPart, userMessage } from "./message";
import { isTerminalState, RunStateMachine } from "./runStateMachine";

describe("RunStateMachine", () => {
  const input = [userMessage("question")];

  it("numbers events from zero without gaps", () => {
    const machine = new RunStateMachine("echo", input, "stream", "run-1");
    const events = [
      machine.created(),
      machine.start(),
      machine.appendPart(createPart("a")),
      machine.appendPart(createPart("b")),
      machine.completeMessage(),
      machine.complete(),
    ];

    expect(events.map((event) => event.sequence)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(events.map((event) => event.type)).toEqual([
      "run.created",
      "run.in-progress",
      "message.part",
      "message.part",
      "message.completed",
      "run.completed",
    ]);
    expect(events.every((event) => event.runId === "run-1")).toBe(true);
    expect(machine.run.state).toBe("completed");
    expect(machine.run.output).toEqual([{ role: "agent", parts: [{ content: "a" }, { content: "b" }] }]);
  });

  it("keeps earlier snapshots unchanged", () => {
    const machine = new RunStateMachine("echo", input, "sync");
    const created = machine.created();
    machine.start();
    machine.fail({ code: "BackendError", message: "nope" });

    expect(created.type === "run.created" && created.payload.run.state).toBe("created");
    expect(machine.run.error).toEqual({ code: "BackendError", message: "nope" });
    expect(Object.isFrozen(machine.run)).toBe(true);
  });

  it("appends a whole message after closing the pending one", () => {
    const machine = new RunStateMachine("echo", input, "stream");
    machine.created();
    machine.start();
    machine.appendPart(createPart("first"));
    const events = machine.appendMessage({ role: "agent", parts: [createPart("second")] });

    expect(events.map((event) => event.type)).toEqual(["message.completed", "message.part", "message.completed"]);
    const last = events[2];
    expect(last?.type === "message.completed" && last.payload.messageIndex).toBe(1);
  });

  it("rejects illegal transitions", () => {
    const machine = new RunStateMachine("echo", input, "sync");
    expect(() => machine.generic({ note: "too early" })).toThrow(/Cannot emit generic/);
    machine.created();
    expect(() => machine.created()).toThrow(/already announced/);
    machine.start();
    machine.appendPart(createPart("dangling"));
    expect(() => machine.complete()).toThrow(/unfinished message/);
    machine.completeMessage();
    machine.complete();
    expect(() => machine.start()).toThrow(/Illegal run transition completed -> in-progress/);
    expect(() => machine.fail({ code: "Timeout", message: "late" })).toThrow(/Illegal run transition/);
  });

  it("fails straight from created", () => {
    const machine = new RunStateMachine("echo", input, "sync");
    machine.created();
    const failed = machine.fail({ code: "Cancelled", message: "stop" });
    expect(failed.sequence).toBe(1);
    expect(machine.isTerminal).toBe(true);
  });

  it("knows the terminal states", () => {
    expect(isTerminalState("completed")).toBe(true);
    expect(isTerminalState("failed")).toBe(true);
    expect(isTerminalState("in-progress")).toBe(false);
  });
});
