/**
 * HS256 service tokens for the slice endpoint.
 *
 * The service accepts a JWT signed with a shared secret as an alternative to
 * a user token; only the `exp` claim is required.
 */

import { createHmac } from "node:crypto";

import { ConfigError } from "../core/errors";

export type TokenClaims = Record<string, unknown> & {
  exp?: number;
};

export type ServiceTokenOptions = {
  /** Lifetime in seconds */
  ttlSeconds?: number;
  /** Current time in ms since epoch */
  now?: number;
};

export const DEFAULT_TOKEN_TTL_SECONDS = 3600;

const HEADER = { alg: "HS256", typ: "JWT" } as const;

function base64url(input: string | Buffer): string {
  return Buffer.from(input).toString("base64url");
}

export function signToken(claims: TokenClaims, secret: string): string {
  const signingInput = `${base64url(JSON.stringify(HEADER))}.${base64url(JSON.stringify(claims))}`;
  const signature = createHmac("sha256", secret).update(signingInput).digest();
  return `${signingInput}.${base64url(signature)}`;
}

export function createServiceToken(secret: string, options: ServiceTokenOptions = {}): string {
  const ttl = options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
  if (!Number.isSafeInteger(ttl) || ttl <= 0) {
    throw new ConfigError(`token ttl must be a positive integer, got ${ttl}`);
  }
  const nowSeconds = Math.floor((options.now ?? Date.now()) / 1000);
  return signToken({ exp: nowSeconds + ttl }, secret);
}
