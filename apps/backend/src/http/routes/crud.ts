import type { FastifyInstance } from "fastify";
import type { z } from "zod";
import type { Row } from "../../db/table.js";
import type { EntityService } from "../../services/entityService.js";
import type { Guard } from "../auth/guard.js";
import { parseBody } from "../validation.js";

export type AdminCrudOptions<T extends Row, K extends keyof T & string, Input extends Patch, Patch> = {
  /** Collection path, e.g. `/admin/comments`. */
  path: string;
  /** Path parameter carrying the key, e.g. `id` or `name`. */
  param: string;
  service: EntityService<T, K, Input, Patch>;
  inputSchema: z.ZodType<Input, z.ZodTypeDef, unknown>;
  patchSchema: z.ZodType<Patch, z.ZodTypeDef, unknown>;
  key: (params: unknown) => T[K];
  list: (query: unknown) => Promise<T[]>;
  deletable?: boolean;
};

/**
 * Admin create/retrieve/update/list (and optionally delete) for one entity.
 * PUT takes the full input and PATCH a partial one; both re-check the merged row.
 */
export function registerAdminCrud<T extends Row, K extends keyof T & string, Input extends Patch, Patch>(
  app: FastifyInstance,
  guard: Guard,
  options: AdminCrudOptions<T, K, Input, Patch>
) {
  const { path, service } = options;
  const item = `${path}/:${options.param}`;
  const preHandler = guard.admin;

  app.get(path, { preHandler }, async (req) => options.list(req.query));

  app.post(path, { preHandler }, async (req, reply) => {
    const input = parseBody(options.inputSchema, req.body);
    const created = await service.create(input);
    reply.code(201);
    return created;
  });

  app.get(item, { preHandler }, async (req) => service.get(options.key(req.params)));

  app.put(item, { preHandler }, async (req) => {
    const key = options.key(req.params);
    return service.update(key, parseBody(options.inputSchema, req.body));
  });

  app.patch(item, { preHandler }, async (req) => {
    const key = options.key(req.params);
    return service.update(key, parseBody(options.patchSchema, req.body));
  });

  if (options.deletable) {
    app.delete(item, { preHandler }, async (req, reply) => {
      await service.remove(options.key(req.params));
      return reply.code(204).send();
    });
  }
}
