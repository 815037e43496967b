import { readFileSync, statSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

/**
 * Agent role configuration: task type -> prompt, model parameters, lane and
 * retry policy. Data, not code: roles live in agent-roles.yaml and are picked
 * up again when the file changes, without a redeploy.
 */

export const retryPolicySchema = z.object({
  maxRetries: z.number().int().nonnegative().default(2),
  backoffMs: z.number().int().nonnegative().default(500),
  maxBackoffMs: z.number().int().nonnegative().default(10_000),
});

export const agentRoleSchema = z.object({
  promptRef: z.string().min(1),
  instructions: z.string().min(1),
  lane: z.enum(["default", "stream"]).default("default"),
  modelParams: z
    .object({
      model: z.string().optional(),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .default({}),
  retryPolicy: retryPolicySchema.default({}),
  timeoutMs: z.number().int().positive().default(60_000),
});

const rolesFileSchema = z.object({
  roles: z.record(z.string().min(1), agentRoleSchema),
});

export type RetryPolicy = z.infer<typeof retryPolicySchema>;

export interface AgentRoleConfig extends z.infer<typeof agentRoleSchema> {
  taskType: string;
}

export interface RoleConfigSource {
  getRoleConfig(taskType: string): Promise<AgentRoleConfig | null>;
}

export function parseAgentRoles(raw: unknown): Map<string, AgentRoleConfig> {
  const parsed = rolesFileSchema.parse(raw);
  const out = new Map<string, AgentRoleConfig>();
  for (const [taskType, role] of Object.entries(parsed.roles)) {
    out.set(taskType, { ...role, taskType });
  }
  return out;
}

export class StaticRoleConfigSource implements RoleConfigSource {
  constructor(private readonly roles: Map<string, AgentRoleConfig>) {}

  async getRoleConfig(taskType: string): Promise<AgentRoleConfig | null> {
    return this.roles.get(taskType) ?? null;
  }
}

/** Reads agent-roles.yaml, re-parsing only when its mtime changes. */
export class FileRoleConfigSource implements RoleConfigSource {
  private cached: Map<string, AgentRoleConfig> | null = null;
  private cachedMtimeMs = -1;

  constructor(private readonly path: string) {}

  private load(): Map<string, AgentRoleConfig> {
    const mtimeMs = statSync(this.path).mtimeMs;
    if (!this.cached || mtimeMs !== this.cachedMtimeMs) {
      this.cached = parseAgentRoles(parseYaml(readFileSync(this.path, "utf-8")));
      this.cachedMtimeMs = mtimeMs;
    }
    return this.cached;
  }

  async getRoleConfig(taskType: string): Promise<AgentRoleConfig | null> {
    return this.load().get(taskType) ?? null;
  }
}
