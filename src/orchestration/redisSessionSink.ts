import { createClient } from "redis";
import type { SessionEvent, SessionSink } from "./sessionSink";

/** The slice of a redis client the sink writes through. */
export interface SessionStore {
  set(key: string, value: string): Promise<unknown>;
  sAdd(key: string, member: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Persists the latest snapshot of each session under `session:{id}` and
 * indexes session ids in the `sessions:list` set.
 */
export class RedisSessionSink implements SessionSink {
  constructor(private readonly store: SessionStore) {}

  static async connect(url: string): Promise<RedisSessionSink> {
    const client = createClient({ url });
    client.on("error", (error: unknown) => {
      console.error("[RedisSessionSink] Redis client error:", error);
    });
    await client.connect();
    console.log("✅ Redis connected");
    return new RedisSessionSink({
      set: (key, value) => client.set(key, value),
      sAdd: (key, member) => client.sAdd(key, member),
      quit: () => client.quit(),
    });
  }

  async record(event: SessionEvent): Promise<void> {
    const { session } = event;
    await this.store.set(`session:${session.id}`, JSON.stringify(session));
    if (event.type === "session.started") {
      await this.store.sAdd("sessions:list", session.id);
    }
    if (event.type === "session.finished") {
      console.log(`[RedisSessionSink] Saved ${session.kind} session ${session.id} (${session.status})`);
    }
  }

  async close(): Promise<void> {
    await this.store.quit();
  }
}
