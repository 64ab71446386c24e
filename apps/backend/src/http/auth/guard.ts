import type { FastifyInstance, FastifyRequest } from "fastify";
import type { UserRole } from "@lasercare/shared-schemas";
import { AuthenticationError, PermissionDeniedError } from "../errors.js";
import type { Principal } from "../../services/auth/principal.js";
import type { TokenService } from "../../services/auth/tokens.js";
import type { UserStore } from "../../services/identity/userStore.js";

declare module "fastify" {
  interface FastifyRequest {
    principal: Principal | null;
  }
}

export type GuardHook = (req: FastifyRequest) => Promise<void>;

/**
 * Route-level capability checks, attached as `preHandler`. Each runs before
 * the body is parsed or any store is touched.
 */
export type Guard = {
  authenticated: GuardHook;
  admin: GuardHook;
  role(role: UserRole, message: string): GuardHook;
};

const BEARER = /^Bearer\s+(\S+)$/i;

export function decoratePrincipal(app: FastifyInstance): void {
  app.decorateRequest("principal", null);
}

export function createGuard(users: UserStore, tokens: TokenService): Guard {
  async function authenticate(req: FastifyRequest): Promise<Principal> {
    const token = BEARER.exec(req.headers.authorization ?? "")?.[1];
    if (!token) throw new AuthenticationError("Authentication credentials were not provided.");

    const claims = tokens.verifyAccess(token);
    if (!claims) throw new AuthenticationError("Given token not valid for any token type");

    const user = await users.get(claims.userId);
    if (!user) throw new AuthenticationError("User not found");

    const principal: Principal = { id: user.id, username: user.username, role: user.role };
    req.principal = principal;
    return principal;
  }

  function role(required: UserRole, message: string): GuardHook {
    return async (req) => {
      const principal = await authenticate(req);
      if (principal.role !== required) throw new PermissionDeniedError(message);
    };
  }

  return {
    authenticated: async (req) => {
      await authenticate(req);
    },
    admin: role("ADMIN", "You do not have permission to perform this action."),
    role,
  };
}

export function requirePrincipal(req: FastifyRequest): Principal {
  if (!req.principal) throw new AuthenticationError();
  return req.principal;
}
