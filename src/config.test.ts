import { describe, expect, it } from "vitest";
import { ConfigError, parseConfig } from "./config";

describe("parseConfig", () => {
  it("fills in defaults for an empty environment", () => {
    expect(parseConfig({})).toEqual({
      port: 3001,
      hostName: "agent-relay",
      hostDescription: "Agents hosted by this relay",
      llm: undefined,
      agentsFile: undefined,
      redisUrl: undefined,
      allowedOrigins: ["http://localhost:3000"],
      router: { timeoutMs: 300_000, retry: { attempts: 3, baseDelayMs: 250 } },
      fanOutConcurrency: 4,
    });
  });

  it("reads numbers, origin lists and the LLM backend", () => {
    const config = parseConfig({
      PORT: "8080",
      ALLOWED_ORIGINS: "http://a.test, http://b.test,",
      LLM_API_URL: "http://llm.test/v1/chat/completions",
      LLM_MODEL: "test-model",
      AGENTS_FILE: "agents.json",
      ROUTER_RETRY_BASE_DELAY_MS: "0",
      REDIS_URL: "",
    });

    expect(config.port).toBe(8080);
    expect(config.allowedOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.llm).toEqual({ apiUrl: "http://llm.test/v1/chat/completions", model: "test-model" });
    expect(config.agentsFile).toBe("agents.json");
    expect(config.router.retry.baseDelayMs).toBe(0);
    expect(config.redisUrl).toBeUndefined();
  });

  it("names the offending variable", () => {
    expect(() => parseConfig({ PORT: "-1" })).toThrow(ConfigError);
    expect(() => parseConfig({ PORT: "-1" })).toThrow(/^Invalid configuration: PORT: /);
  });

  it("requires the LLM settings together and before an agents file", () => {
    expect(() => parseConfig({ LLM_MODEL: "test-model" })).toThrow(
      "Invalid configuration: LLM_API_URL and LLM_MODEL must be set together"
    );
    expect(() => parseConfig({ AGENTS_FILE: "agents.json" })).toThrow(
      "Invalid configuration: AGENTS_FILE needs LLM_API_URL and LLM_MODEL"
    );
  });
});
