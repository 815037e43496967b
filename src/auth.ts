import type { IncomingMessage, ServerResponse } from "http";
import { timingSafeEqual } from "crypto";

export interface AuthOptions {
  /** Expected bearer token. When null, requests pass only if auth is disabled. */
  token: string | null;
  disabled: boolean;
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Check Authorization: Bearer <token>.
 * Returns true if authorized, false if not (and sends 401).
 */
export function requireBearer(req: IncomingMessage, res: ServerResponse, opts: AuthOptions): boolean {
  if (opts.disabled) return true;
  const auth = req.headers.authorization;
  const token = auth?.startsWith("Bearer ") ? auth.slice(7).trim() : null;
  if (!token || !opts.token || !tokensMatch(token, opts.token)) {
    res.writeHead(401, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "unauthorized", message: "Missing or invalid Authorization header" }));
    return false;
  }
  return true;
}
