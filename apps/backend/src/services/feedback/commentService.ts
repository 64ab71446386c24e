import { randomUUID } from "node:crypto";
import type { Comment, CommentInput, CommentPatch } from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import { checkComment } from "../../domain/rules.js";
import type { Principal } from "../auth/principal.js";
import { EntityService, notFound, type ServiceContext } from "../entityService.js";
import type { UserStore } from "../identity/userStore.js";
import { matchesSearch, usernamesById } from "../search.js";

export class CommentService extends EntityService<Comment, "id", CommentInput, CommentPatch> {
  constructor(
    table: Table<Comment, "id">,
    private readonly users: UserStore,
    ctx: ServiceContext
  ) {
    super(
      table,
      {
        entity: "comment",
        build: (input, now) => ({
          id: randomUUID(),
          user_id: input.user_id,
          message: input.message,
          is_reviewed: input.is_reviewed ?? false,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        check: (row) => checkComment(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<Comment[]> {
    const [rows, names] = await Promise.all([this.list(), usernamesById(this.users)]);
    return rows.filter((r) => matchesSearch(term, [r.message, names.get(r.user_id)]));
  }

  unreviewed(): Promise<Comment[]> {
    return this.list({ is_reviewed: false });
  }

  // Customers always author as themselves and cannot mark their own feedback reviewed.
  createOwn(principal: Principal, message: string): Promise<Comment> {
    return this.create({ user_id: principal.id, message });
  }

  listOwn(principal: Principal): Promise<Comment[]> {
    return this.list({ user_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<Comment> {
    const row = await this.find(id);
    if (!row || row.user_id !== principal.id) throw notFound("comment");
    return row;
  }
}
