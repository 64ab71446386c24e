import type { FastifyInstance } from "fastify";
import {
  CommentInputSchema,
  CommentPatchSchema,
  CustomerCommentInputSchema,
} from "@lasercare/shared-schemas";
import type { CommentService } from "../../services/feedback/commentService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { SearchQuerySchema, parseBody, parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = { comments: CommentService; guard: Guard };

export function registerCommentRoutes(app: FastifyInstance, { comments, guard }: Deps) {
  app.get("/admin/comments/unreviewed", { preHandler: guard.admin }, async () => comments.unreviewed());

  registerAdminCrud(app, guard, {
    path: "/admin/comments",
    param: "id",
    service: comments,
    inputSchema: CommentInputSchema,
    patchSchema: CommentPatchSchema,
    key: (params) => uuidParam(params, "comment"),
    list: (query) => comments.search(parseQuery(SearchQuerySchema, query).search),
  });

  const customer = { preHandler: guard.role("CUSTOMER", "Only customers can access or create comments.") };

  app.post("/comments", customer, async (req, reply) => {
    const { message } = parseBody(CustomerCommentInputSchema, req.body);
    const created = await comments.createOwn(requirePrincipal(req), message);
    reply.code(201);
    return created;
  });

  app.get("/comments", customer, async (req) => comments.listOwn(requirePrincipal(req)));

  app.get("/comments/:id", customer, async (req) => {
    return comments.getOwn(requirePrincipal(req), uuidParam(req.params, "comment"));
  });
}
