import crypto from "crypto";
import { AppError } from "../errors.js";

export type TokenClaims = {
  /** Participant id. */
  sub: string;
  name?: string;
  exp?: number; // unix seconds
};

function base64url(input: Buffer | string): string {
  return Buffer.from(input).toString("base64url");
}

function parseBase64url(input: string): Buffer {
  return Buffer.from(input, "base64url");
}

function invalidToken() {
  return new AppError("INVALID_TOKEN", 401, "Invalid token");
}

function hmac(data: string, secret: string) {
  return crypto.createHmac("sha256", secret).update(data).digest("base64url");
}

export function signToken(
  claims: TokenClaims,
  secret: string,
  expiresInSeconds = 60 * 60
) {
  const header = { alg: "HS256", typ: "JWT" };
  const exp = Math.floor(Date.now() / 1000) + expiresInSeconds;
  const payload = { ...claims, exp };
  const encodedHeader = base64url(JSON.stringify(header));
  const encodedPayload = base64url(JSON.stringify(payload));
  const data = `${encodedHeader}.${encodedPayload}`;
  return `${data}.${hmac(data, secret)}`;
}

function parseClaims(encodedPayload: string): TokenClaims {
  let payload: unknown;
  try {
    payload = JSON.parse(parseBase64url(encodedPayload).toString("utf8"));
  } catch {
    throw invalidToken();
  }
  if (typeof payload !== "object" || payload === null) throw invalidToken();
  const sub = "sub" in payload ? payload.sub : undefined;
  const name = "name" in payload ? payload.name : undefined;
  const exp = "exp" in payload ? payload.exp : undefined;
  if (typeof sub !== "string" || sub === "") throw invalidToken();
  return {
    sub,
    ...(typeof name === "string" ? { name } : {}),
    ...(typeof exp === "number" ? { exp } : {})
  };
}

export function verifyToken(token: string, secret: string): TokenClaims {
  const parts = token.split(".");
  if (parts.length !== 3) throw invalidToken();
  const [encodedHeader, encodedPayload, signature] = parts;
  const given = Buffer.from(signature);
  const expected = Buffer.from(hmac(`${encodedHeader}.${encodedPayload}`, secret));
  if (given.length !== expected.length || !crypto.timingSafeEqual(given, expected)) {
    throw invalidToken();
  }
  const claims = parseClaims(encodedPayload);
  if (claims.exp && claims.exp < Math.floor(Date.now() / 1000)) {
    throw new AppError("TOKEN_EXPIRED", 401, "Token expired");
  }
  return claims;
}
