import jwt from "jsonwebtoken";
import { z } from "zod";
import { UserRoleSchema, type TokenPair, type UserRole } from "@lasercare/shared-schemas";

const AccessClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  role: UserRoleSchema,
  type: z.literal("access"),
});

const RefreshClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  type: z.literal("refresh"),
});

export type TokenSettings = {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
};

export type AccessClaims = { userId: number; role: UserRole };

export class TokenService {
  constructor(private readonly settings: TokenSettings) {}

  issuePair(user: { id: number; role: UserRole }): TokenPair {
    return {
      refresh: this.issueRefresh(user.id),
      access: this.issueAccess(user),
    };
  }

  issueAccess(user: { id: number; role: UserRole }): string {
    return jwt.sign({ role: user.role, type: "access" }, this.settings.secret, {
      algorithm: "HS256",
      subject: String(user.id),
      expiresIn: this.settings.accessTtlSeconds,
    });
  }

  issueRefresh(userId: number): string {
    return jwt.sign({ type: "refresh" }, this.settings.secret, {
      algorithm: "HS256",
      subject: String(userId),
      expiresIn: this.settings.refreshTtlSeconds,
    });
  }

  /** Null for any token that is malformed, expired, forged or of the wrong type. */
  verifyAccess(token: string): AccessClaims | null {
    const claims = AccessClaimsSchema.safeParse(this.decode(token));
    return claims.success ? { userId: Number(claims.data.sub), role: claims.data.role } : null;
  }

  verifyRefresh(token: string): number | null {
    const claims = RefreshClaimsSchema.safeParse(this.decode(token));
    return claims.success ? Number(claims.data.sub) : null;
  }

  private decode(token: string): unknown {
    try {
      return jwt.verify(token, this.settings.secret, { algorithms: ["HS256"] });
    } catch (err) {
      if (err instanceof jwt.JsonWebTokenError) return null;
      throw err;
    }
  }
}
