import type { Request, Response, NextFunction } from "express";
import { unauthorized } from "../errors.js";
import { type TokenClaims, verifyToken } from "./token.js";

export type AuthedRequest = Request & { auth?: TokenClaims };

/** Value of one cookie from a `Cookie` header; values may contain `=`. */
export function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;
  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    if (part.slice(0, eq).trim() === name) return part.slice(eq + 1).trim() || null;
  }
  return null;
}

const BEARER = /^Bearer\s+(\S+)$/i;

/** Bearer header first, then the `auth_token` cookie. */
export function extractToken(headers: {
  authorization?: string;
  cookie?: string;
}): string | null {
  const match = BEARER.exec(headers.authorization ?? "");
  if (match) return match[1] ?? null;
  return readCookie(headers.cookie, "auth_token");
}

export function requireAuth(secret: string) {
  return (req: AuthedRequest, res: Response, next: NextFunction) => {
    const token = extractToken(req.headers);
    if (!token) {
      res.setHeader("WWW-Authenticate", 'Bearer realm="drafts"');
      return next(unauthorized());
    }
    try {
      req.auth = verifyToken(token, secret);
      return next();
    } catch (err) {
      return next(err);
    }
  };
}

/** The authenticated participant; only valid behind `requireAuth`. */
export function participantOf(req: AuthedRequest): string {
  if (!req.auth) throw unauthorized();
  return req.auth.sub;
}
