import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import type { Env } from "../config/env.js";
import { createPool } from "../db/pool.js";
import { createLogger, loggerSettings, type LoggerSettings } from "../observability/logger.js";
import { createServices, type Services } from "../services/index.js";
import { createMemoryStores, createPgStores } from "../services/stores.js";
import { createGuard, decoratePrincipal, type Guard } from "./auth/guard.js";
import { HttpError } from "./errors.js";
import { registerRoutes } from "./routes/index.js";

export type ServerOptions = {
  services: Services;
  guard?: Guard;
  logger?: LoggerSettings | false;
  onClose?: () => Promise<void>;
};

export async function buildServer({ services, guard, logger = false, onClose }: ServerOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger });

  decoratePrincipal(app);
  if (onClose) app.addHook("onClose", onClose);

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof HttpError) {
      return reply.code(err.statusCode).send(err.toBody());
    }
    // Body parsing and other framework-level rejections keep their status.
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ error: "Internal Server Error" });
  });

  app.get("/health", async () => ({ status: "ok", service: "backend" }));

  await registerRoutes(app, services, guard ?? createGuard(services.userStore, services.tokens));

  return app;
}

export async function createHttpServer(env: Env): Promise<FastifyInstance> {
  const log = createLogger(env.LOG_LEVEL);
  const pool = env.STORE_DRIVER === "postgres" ? createPool(env) : null;
  const stores = pool ? createPgStores(pool) : createMemoryStores();

  const services = createServices(
    stores,
    { log, clock: () => new Date() },
    {
      tokens: {
        secret: env.JWT_SECRET,
        accessTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
        refreshTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
      },
    }
  );

  const app = await buildServer({
    services,
    logger: loggerSettings(env.LOG_LEVEL),
    onClose: async () => {
      await pool?.end();
    },
  });

  await app.listen({ host: env.HOST, port: env.BACKEND_PORT });
  app.log.info(`backend listening on :${env.BACKEND_PORT} (${env.STORE_DRIVER} store)`);
  return app;
}
