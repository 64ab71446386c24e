import type { ProfilePatch, User, UserInput, UserPatch } from "@lasercare/shared-schemas";
import { PermissionDeniedError } from "../../http/errors.js";
import type { Principal } from "../auth/principal.js";
import { PBKDF2_ITERATIONS, UNUSABLE_PASSWORD, hashPassword } from "../auth/passwords.js";
import { notFound, runWrite, type ServiceContext } from "../entityService.js";
import { matchesSearch } from "../search.js";
import { publicUser, type UserRecord, type UserStore } from "./userStore.js";

const ENTITY = "user";

export type UserServiceOptions = {
  passwordIterations?: number;
};

export class UserService {
  private readonly iterations: number;

  constructor(
    private readonly users: UserStore,
    private readonly ctx: ServiceContext,
    options: UserServiceOptions = {}
  ) {
    this.iterations = options.passwordIterations ?? PBKDF2_ITERATIONS;
  }

  async list(search?: string): Promise<User[]> {
    const all = await this.users.list();
    return all.filter((u) => matchesSearch(search, [u.username, u.email, u.role])).map(publicUser);
  }

  async get(id: number): Promise<User> {
    return publicUser(await this.record(id));
  }

  async record(id: number): Promise<UserRecord> {
    const user = await this.users.get(id);
    if (!user) throw notFound(ENTITY);
    return user;
  }

  async create(input: UserInput): Promise<User> {
    return runWrite(this.ctx, ENTITY, "create", async () => {
      const stamp = this.ctx.clock().toISOString();
      const saved = await this.users.insert({
        username: input.username,
        email: input.email ?? "",
        first_name: input.first_name ?? "",
        last_name: input.last_name ?? "",
        role: input.role ?? "CUSTOMER",
        password_hash: input.password ? await hashPassword(input.password, this.iterations) : UNUSABLE_PASSWORD,
        created_at: stamp,
        updated_at: stamp,
      });
      this.ctx.log.info({ entity: ENTITY, key: saved.id, role: saved.role }, "user created");
      return publicUser(saved);
    });
  }

  async update(id: number, patch: UserPatch): Promise<User> {
    return runWrite(this.ctx, ENTITY, "update", async () => {
      const existing = await this.record(id);
      const { password, ...fields } = patch;
      const next: UserRecord = {
        ...existing,
        ...fields,
        password_hash: password ? await hashPassword(password, this.iterations) : existing.password_hash,
        updated_at: this.ctx.clock().toISOString(),
      };
      const saved = await this.users.update(id, next);
      if (!saved) throw notFound(ENTITY);
      this.ctx.log.info({ entity: ENTITY, key: id }, "user updated");
      return publicUser(saved);
    });
  }

  async remove(id: number): Promise<void> {
    await runWrite(this.ctx, ENTITY, "delete", async () => {
      const deleted = await this.users.delete(id);
      if (!deleted) throw notFound(ENTITY);
      this.ctx.log.info({ entity: ENTITY, key: id }, "user deleted");
    });
  }

  // Self-service profile: ownership is checked against the path id before any lookup.
  async getOwn(principal: Principal, id: number): Promise<User> {
    this.assertSelf(principal, id);
    return this.get(id);
  }

  async updateOwn(principal: Principal, id: number, patch: ProfilePatch): Promise<User> {
    this.assertSelf(principal, id);
    return this.update(id, patch);
  }

  private assertSelf(principal: Principal, id: number): void {
    if (principal.id !== id) {
      throw new PermissionDeniedError("You can only access your own profile.");
    }
  }
}
