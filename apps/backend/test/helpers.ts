import type { FastifyInstance } from "fastify";
import type { User, UserRole } from "@lasercare/shared-schemas";
import { buildServer } from "../src/http/server.js";
import { createLogger } from "../src/observability/logger.js";
import { createServices, type Services } from "../src/services/index.js";
import { createMemoryStores, type Stores } from "../src/services/stores.js";

export const NOW = new Date("2025-03-10T09:00:00.000Z");
export const PASSWORD = "test-password";

export type TestContext = {
  app: FastifyInstance;
  services: Services;
  stores: Stores;
};

export type Actor = {
  user: User;
  headers: { authorization: string };
};

export async function createTestContext(): Promise<TestContext> {
  const stores = createMemoryStores();
  const services = createServices(
    stores,
    { log: createLogger("silent"), clock: () => NOW },
    {
      tokens: { secret: "test-secret", accessTtlSeconds: 300, refreshTtlSeconds: 3600 },
      passwordIterations: 1_000,
    }
  );
  const app = await buildServer({ services });
  return { app, services, stores };
}

export async function createActor(ctx: TestContext, username: string, role: UserRole): Promise<Actor> {
  const user = await ctx.services.users.create({ username, role, password: PASSWORD });
  return { user, headers: bearer(ctx.services.tokens.issueAccess(user)) };
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
