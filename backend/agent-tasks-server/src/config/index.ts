/**
 * Process configuration
 *
 * Read once from environment variables at start-up and handed to the core
 * components as constructor options.
 */

import { z } from "zod";
import { getDefaultDbPath } from "../db/connection";
import { MAX_TIMER_DELAY_MS } from "../timers";

export const MAX_CONCURRENT_LIMIT = 32;

const intVar = (fallback: number) => z.coerce.number().int().default(fallback);
const positiveIntVar = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/** Milliseconds, bounded by what setTimeout can honour */
const delayVar = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(fallback);

const flagVar = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .default("0")
  .transform((value) => value === "1" || value === "true" || value === "yes");

const envSchema = z.object({
  AGENT_TASKS_HOST: z.string().min(1).default("0.0.0.0"),
  AGENT_TASKS_PORT: intVar(3000).pipe(z.number().min(0).max(65535)),
  AGENT_TASKS_TRANSPORT_URL: z.string().url().default("ws://127.0.0.1:3000/ws/transport"),
  AGENT_TASKS_RECONNECT_BASE_MS: delayVar(500),
  AGENT_TASKS_RECONNECT_MAX_MS: delayVar(30000),
  AGENT_TASKS_REQUEST_TIMEOUT_MS: delayVar(10000),
  AGENT_TASKS_DB_PATH: z.string().min(1).optional(),
  AGENT_TASKS_OVERFLOW_THRESHOLD_BYTES: z.coerce.number().int().nonnegative().default(32768),
  AGENT_TASKS_OVERFLOW_TTL_MS: positiveIntVar(24 * 60 * 60 * 1000),
  AGENT_TASKS_CLAIM_TTL_MS: positiveIntVar(24 * 60 * 60 * 1000),
  // Clamped rather than rejected
  AGENT_TASKS_MAX_CONCURRENT: intVar(3).transform((value) =>
    Math.max(1, Math.min(value, MAX_CONCURRENT_LIMIT))
  ),
  AGENT_TASKS_TASK_TIMEOUT_MS: delayVar(4 * 60 * 60 * 1000),
  AGENT_TASKS_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(30000),
  AGENT_TASKS_TEST_MODE: flagVar,
});

export interface AgentTasksConfig {
  server: {
    host: string;
    port: number;
  };
  transport: {
    url: string;
    reconnectBaseDelayMs: number;
    reconnectMaxDelayMs: number;
    requestTimeoutMs: number;
  };
  store: {
    dbPath: string;
  };
  broker: {
    overflowThresholdBytes: number;
    overflowTtlMs: number;
    claimTtlMs: number;
  };
  worker: {
    maxConcurrent: number;
    taskTimeoutMs: number;
    shutdownTimeoutMs: number;
  };
  testMode: boolean;
}

/**
 * Parse the environment into a typed configuration.
 * Empty variables count as unset.
 *
 * @throws ZodError if a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentTasksConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("AGENT_TASKS_") && value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.parse(present);

  return {
    server: {
      host: parsed.AGENT_TASKS_HOST,
      port: parsed.AGENT_TASKS_PORT,
    },
    transport: {
      url: parsed.AGENT_TASKS_TRANSPORT_URL,
      reconnectBaseDelayMs: parsed.AGENT_TASKS_RECONNECT_BASE_MS,
      reconnectMaxDelayMs: parsed.AGENT_TASKS_RECONNECT_MAX_MS,
      requestTimeoutMs: parsed.AGENT_TASKS_REQUEST_TIMEOUT_MS,
    },
    store: {
      dbPath: parsed.AGENT_TASKS_DB_PATH ?? getDefaultDbPath(),
    },
    broker: {
      overflowThresholdBytes: parsed.AGENT_TASKS_OVERFLOW_THRESHOLD_BYTES,
      overflowTtlMs: parsed.AGENT_TASKS_OVERFLOW_TTL_MS,
      claimTtlMs: parsed.AGENT_TASKS_CLAIM_TTL_MS,
    },
    worker: {
      maxConcurrent: parsed.AGENT_TASKS_MAX_CONCURRENT,
      taskTimeoutMs: parsed.AGENT_TASKS_TASK_TIMEOUT_MS,
      shutdownTimeoutMs: parsed.AGENT_TASKS_SHUTDOWN_TIMEOUT_MS,
    },
    testMode: parsed.AGENT_TASKS_TEST_MODE,
  };
}
