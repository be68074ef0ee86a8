import { describe, expect, it } from "vitest";
import { signToken, verifyToken } from "../../src/auth/token.js";

const SECRET = "test-secret";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

describe("auth tokens", () => {
  it("round-trips claims", () => {
    const token = signToken({ sub: "P1", name: "Pat" }, SECRET);
    const claims = verifyToken(token, SECRET);
    expect(claims.sub).toBe("P1");
    expect(claims.name).toBe("Pat");
    expect(typeof claims.exp).toBe("number");
  });

  it("rejects a token signed with another secret", () => {
    const token = signToken({ sub: "P1" }, "other-secret");
    expect(thrown(() => verifyToken(token, SECRET))).toEqual(
      expect.objectContaining({ code: "INVALID_TOKEN", status: 401 })
    );
  });

  it("rejects a tampered payload", () => {
    const [header, , signature] = signToken({ sub: "P1" }, SECRET).split(".");
    const forged = Buffer.from(JSON.stringify({ sub: "commish" })).toString("base64url");
    expect(thrown(() => verifyToken(`${header}.${forged}.${signature}`, SECRET))).toEqual(
      expect.objectContaining({ code: "INVALID_TOKEN" })
    );
  });

  it("rejects malformed tokens and empty subjects", () => {
    expect(thrown(() => verifyToken("not-a-token", SECRET))).toEqual(
      expect.objectContaining({ code: "INVALID_TOKEN" })
    );
    expect(thrown(() => verifyToken(signToken({ sub: "" }, SECRET), SECRET))).toEqual(
      expect.objectContaining({ code: "INVALID_TOKEN" })
    );
  });

  it("rejects expired tokens", () => {
    const token = signToken({ sub: "P1" }, SECRET, -60);
    expect(thrown(() => verifyToken(token, SECRET))).toEqual(
      expect.objectContaining({ code: "TOKEN_EXPIRED", status: 401 })
    );
  });
});
