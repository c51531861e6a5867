import { z } from "zod";

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DEFAULT_PAGE_LIMIT: z.coerce.number().int().positive().default(25),
  MAX_PAGE_LIMIT: z.coerce.number().int().positive().default(200)
});

export interface ServerConfig {
  port: number;
  host: string;
  pageLimits: PageLimits;
}

export interface PageLimits {
  defaultLimit: number;
  maxLimit: number;
}

export const DEFAULT_PAGE_LIMITS: PageLimits = { defaultLimit: 25, maxLimit: 200 };

/** Reads the server settings from the environment, failing fast on malformed values. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid server configuration: ${issues.join("; ")}`);
  }
  const { PORT, HOST, DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    pageLimits: { defaultLimit: Math.min(DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT), maxLimit: MAX_PAGE_LIMIT }
  };
}
