import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import { UNUSABLE_PASSWORD, hashPassword, verifyPassword } from "../src/services/auth/passwords.js";
import { TokenService } from "../src/services/auth/tokens.js";

const settings = { secret: "test-secret", accessTtlSeconds: 300, refreshTtlSeconds: 3600 };

describe("passwords", () => {
  it("verifies the password it hashed", async () => {
    const encoded = await hashPassword("correct horse", 1_000);
    expect(encoded.split("$").slice(0, 2)).toEqual(["pbkdf2_sha256", "1000"]);
    expect(await verifyPassword("correct horse", encoded)).toBe(true);
    expect(await verifyPassword("wrong horse", encoded)).toBe(false);
  });

  it("salts every hash", async () => {
    expect(await hashPassword("same", 1_000)).not.toBe(await hashPassword("same", 1_000));
  });

  it("never matches an unusable password", async () => {
    expect(await verifyPassword("", UNUSABLE_PASSWORD)).toBe(false);
    expect(await verifyPassword("!", UNUSABLE_PASSWORD)).toBe(false);
  });
});

describe("TokenService", () => {
  const tokens = new TokenService(settings);

  it("round-trips access claims", () => {
    const { access } = tokens.issuePair({ id: 7, role: "STAFF" });
    expect(tokens.verifyAccess(access)).toEqual({ userId: 7, role: "STAFF" });
  });

  it("keeps access and refresh tokens apart", () => {
    const { access, refresh } = tokens.issuePair({ id: 7, role: "STAFF" });
    expect(tokens.verifyRefresh(refresh)).toBe(7);
    expect(tokens.verifyRefresh(access)).toBeNull();
    expect(tokens.verifyAccess(refresh)).toBeNull();
  });

  it("rejects tokens signed with another secret", () => {
    const forged = new TokenService({ ...settings, secret: "other-secret" }).issueAccess({ id: 7, role: "ADMIN" });
    expect(tokens.verifyAccess(forged)).toBeNull();
  });

  it("rejects expired tokens", () => {
    const expired = jwt.sign({ role: "ADMIN", type: "access" }, settings.secret, {
      subject: "7",
      expiresIn: -10,
    });
    expect(tokens.verifyAccess(expired)).toBeNull();
  });
});
