import type { FastifyInstance } from "fastify";
import { ProfilePatchSchema, UserInputSchema, UserPatchSchema } from "@lasercare/shared-schemas";
import type { UserService } from "../../services/identity/userService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { SearchQuerySchema, parseBody, parseQuery, userIdParam } from "../validation.js";

type Deps = { users: UserService; guard: Guard };

export function registerUserRoutes(app: FastifyInstance, { users, guard }: Deps) {
  const admin = { preHandler: guard.admin };

  app.get("/admin/users", admin, async (req) => {
    const { search } = parseQuery(SearchQuerySchema, req.query);
    return users.list(search);
  });

  app.post("/admin/users", admin, async (req, reply) => {
    const created = await users.create(parseBody(UserInputSchema, req.body));
    reply.code(201);
    return created;
  });

  app.get("/admin/users/:id", admin, async (req) => users.get(userIdParam(req.params)));

  app.put("/admin/users/:id", admin, async (req) => {
    const id = userIdParam(req.params);
    return users.update(id, parseBody(UserInputSchema, req.body));
  });

  app.patch("/admin/users/:id", admin, async (req) => {
    const id = userIdParam(req.params);
    return users.update(id, parseBody(UserPatchSchema, req.body));
  });

  app.delete("/admin/users/:id", admin, async (req, reply) => {
    await users.remove(userIdParam(req.params));
    return reply.code(204).send();
  });

  // Self-service profile; another user's id is refused with 403 rather than hidden.
  app.get("/users/profile/:id", { preHandler: guard.authenticated }, async (req) => {
    return users.getOwn(requirePrincipal(req), userIdParam(req.params));
  });

  app.patch("/users/profile/:id", { preHandler: guard.authenticated }, async (req) => {
    const principal = requirePrincipal(req);
    const id = userIdParam(req.params);
    return users.updateOwn(principal, id, parseBody(ProfilePatchSchema, req.body));
  });
}
