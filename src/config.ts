import { join } from "path";
import { z } from "zod";

/**
 * Process configuration from the environment. The entry point imports
 * "dotenv/config" first, so a local .env file is honoured.
 */

const intFromEnv = (fallback: number) =>
  z.preprocess(
    (v) => (v === undefined || v === "" ? undefined : Number(v)),
    z.number().int().nonnegative().default(fallback),
  );

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  NATS_URL: z.string().optional(),
  NATS_STREAM: z.string().default("RESEARCH_DELIVERY"),
  API_PORT: intFromEnv(3010),
  API_TOKEN: z.string().optional(),
  DISABLE_AUTH: z.enum(["0", "1"]).default("0"),
  WORKFLOW_PATH: z.string().default(join(process.cwd(), "workflow.yaml")),
  AGENT_ROLES_PATH: z.string().default(join(process.cwd(), "agent-roles.yaml")),
  DEFAULT_LANE_CONCURRENCY: intFromEnv(8),
  STREAM_LANE_CONCURRENCY: intFromEnv(4),
  IDEMPOTENCY_CACHE_TTL_MS: intFromEnv(15 * 60 * 1000),
  IDEMPOTENCY_CACHE_MAX: intFromEnv(10_000),
  SUBSCRIBER_BUFFER_SIZE: intFromEnv(256),
  SHUTDOWN_GRACE_MS: intFromEnv(10_000),
});

export interface RuntimeConfig {
  databaseUrl: string | null;
  natsUrl: string | null;
  natsStream: string;
  apiPort: number;
  apiToken: string | null;
  disableAuth: boolean;
  workflowPath: string;
  agentRolesPath: string;
  laneConcurrency: { default: number; stream: number };
  idempotencyCache: { ttlMs: number; maxEntries: number };
  subscriberBufferSize: number;
  shutdownGraceMs: number;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const e = envSchema.parse(env);
  return {
    databaseUrl: e.DATABASE_URL || null,
    natsUrl: e.NATS_URL || null,
    natsStream: e.NATS_STREAM,
    apiPort: e.API_PORT,
    apiToken: e.API_TOKEN || null,
    disableAuth: e.DISABLE_AUTH === "1",
    workflowPath: e.WORKFLOW_PATH,
    agentRolesPath: e.AGENT_ROLES_PATH,
    laneConcurrency: {
      default: Math.max(1, e.DEFAULT_LANE_CONCURRENCY),
      stream: Math.max(1, e.STREAM_LANE_CONCURRENCY),
    },
    idempotencyCache: { ttlMs: e.IDEMPOTENCY_CACHE_TTL_MS, maxEntries: e.IDEMPOTENCY_CACHE_MAX },
    subscriberBufferSize: Math.max(1, e.SUBSCRIBER_BUFFER_SIZE),
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
  };
}
