import { describe, expect, it, vi } from "vitest";
import type { Session } from "../types";
import { RedisSessionSink, type SessionStore } from "./redisSessionSink";

function fakeStore() {
  return {
    set: vi.fn(async (_key: string, _value: string) => "OK"),
    sAdd: vi.fn(async (_key: string, _member: string) => 1),
    quit: vi.fn(async () => "OK"),
  } satisfies SessionStore;
}

const session: Session = {
  id: "session-1",
  kind: "pipeline",
  participants: ["upper"],
  transcript: [],
  round: 0,
  status: "running",
  startedAt: 1,
  updatedAt: 1,
};

describe("RedisSessionSink", () => {
  it("stores the snapshot and indexes new sessions", async () => {
    const store = fakeStore();
    await new RedisSessionSink(store).record({ type: "session.started", session });

    expect(store.set).toHaveBeenCalledWith("session:session-1", JSON.stringify(session));
    expect(store.sAdd).toHaveBeenCalledWith("sessions:list", "session-1");
  });

  it("overwrites the snapshot on later events", async () => {
    const store = fakeStore();
    const finished: Session = { ...session, status: "completed", updatedAt: 2 };
    await new RedisSessionSink(store).record({ type: "session.finished", session: finished });

    expect(store.set).toHaveBeenCalledWith("session:session-1", JSON.stringify(finished));
    expect(store.sAdd).not.toHaveBeenCalled();
  });

  it("quits the client on close", async () => {
    const store = fakeStore();
    await new RedisSessionSink(store).close();

    expect(store.quit).toHaveBeenCalledTimes(1);
  });
});
