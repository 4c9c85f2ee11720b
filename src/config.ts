/**
 * Environment configuration.
 *
 * Every setting is optional here; the CLI decides which ones it needs and
 * lets flags override them.
 */

import { z } from "zod";

import { ConfigError } from "./core/errors";
import { LOG_LEVELS, type LogLevel } from "./log";

export const ENV_PREFIX = "SLICESTITCH_";

const EnvSchema = z.object({
  SLICESTITCH_BASE_URL: z.string().url().optional(),
  SLICESTITCH_TOKEN: z.string().min(1).optional(),
  SLICESTITCH_SECRET: z.string().optional(),
  SLICESTITCH_TOKEN_TTL: z
    .string()
    .regex(/^\d+$/, "must be a positive integer")
    .transform(Number)
    .refine((n) => n > 0, "must be a positive integer")
    .optional(),
  SLICESTITCH_LOG: z.enum(LOG_LEVELS).optional(),
});

export type Config = {
  baseUrl?: string;
  token?: string;
  secret?: string;
  tokenTtlSeconds?: number;
  logLevel?: LogLevel;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const entries = Object.entries(env).filter(
    ([key, value]) => key.startsWith(ENV_PREFIX) && value !== undefined && value !== "",
  );
  const result = EnvSchema.safeParse(Object.fromEntries(entries));
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? issue.path.join(".") : ENV_PREFIX;
    throw new ConfigError(`${key}: ${issue ? issue.message : "invalid value"}`);
  }
  const parsed = result.data;
  return {
    baseUrl: parsed.SLICESTITCH_BASE_URL,
    token: parsed.SLICESTITCH_TOKEN,
    secret: parsed.SLICESTITCH_SECRET,
    tokenTtlSeconds: parsed.SLICESTITCH_TOKEN_TTL,
    logLevel: parsed.SLICESTITCH_LOG,
  };
}
