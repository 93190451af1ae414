import dotenv from "dotenv";
import { z } from "zod";

const numberFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  PORT: numberFromEnv(3001),
  HOST_NAME: z.string().min(1).default("agent-relay"),
  HOST_DESCRIPTION: z.string().default("Agents hosted by this relay"),
  LLM_API_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).optional(),
  AGENTS_FILE: z.string().min(1).optional(),
  REDIS_URL: z.string().url().optional(),
  ALLOWED_ORIGINS: z
    .string()
    .default("http://localhost:3000")
    .transform((value) =>
      value
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  ROUTER_TIMEOUT_MS: numberFromEnv(300_000),
  ROUTER_RETRY_ATTEMPTS: numberFromEnv(3),
  ROUTER_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
  FANOUT_CONCURRENCY: numberFromEnv(4),
});

export interface AppConfig {
  port: number;
  hostName: string;
  hostDescription: string;
  llm?: { apiUrl: string; model: string };
  agentsFile?: string;
  redisUrl?: string;
  allowedOrigins: string[];
  router: { timeoutMs: number; retry: { attempts: number; baseDelayMs: number } };
  fanOutConcurrency: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Validate an environment map. Empty strings count as unset. */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const values = parsed.data;
  if ((values.LLM_API_URL === undefined) !== (values.LLM_MODEL === undefined)) {
    throw new ConfigError(["LLM_API_URL and LLM_MODEL must be set together"]);
  }
  if (values.AGENTS_FILE !== undefined && values.LLM_API_URL === undefined) {
    throw new ConfigError(["AGENTS_FILE needs LLM_API_URL and LLM_MODEL"]);
  }

  return {
    port: values.PORT,
    hostName: values.HOST_NAME,
    hostDescription: values.HOST_DESCRIPTION,
    llm: values.LLM_API_URL && values.LLM_MODEL ? { apiUrl: values.LLM_API_URL, model: values.LLM_MODEL } : undefined,
    agentsFile: values.AGENTS_FILE,
    redisUrl: values.REDIS_URL,
    allowedOrigins: values.ALLOWED_ORIGINS,
    router: {
      timeoutMs: values.ROUTER_TIMEOUT_MS,
      retry: { attempts: values.ROUTER_RETRY_ATTEMPTS, baseDelayMs: values.ROUTER_RETRY_BASE_DELAY_MS },
    },
    fanOutConcurrency: values.FANOUT_CONCURRENCY,
  };
}

/** Load `.env` into the process environment, then validate it. */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
