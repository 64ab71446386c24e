import type pg from "pg";
import { z } from "zod";
import { UserSchema, type User } from "@lasercare/shared-schemas";
import { translateDbError } from "../../db/errors.js";
import { PgTable, toEntity, type Row, type Table } from "../../db/table.js";
import { MemoryTable, type MemoryDatabase } from "../memory/memoryDatabase.js";

export const UserRecordSchema = UserSchema.extend({
  password_hash: z.string(),
});

export type UserRecord = User & { password_hash: string };
export type NewUser = Omit<UserRecord, "id">;

export interface UserStore extends Omit<Table<UserRecord, "id">, "insert"> {
  insert(user: NewUser): Promise<UserRecord>;
  findByUsername(username: string): Promise<UserRecord | null>;
}

const COLUMNS = [
  "id",
  "username",
  "email",
  "first_name",
  "last_name",
  "role",
  "password_hash",
  "created_at",
  "updated_at",
] as const;

export function publicUser(user: UserRecord): User {
  const { password_hash: _hash, ...rest } = user;
  return rest;
}

export class PgUserStore extends PgTable<UserRecord, "id"> implements UserStore {
  constructor(pool: pg.Pool) {
    super(pool, { table: "users", key: "id", schema: UserRecordSchema, columns: COLUMNS, orderBy: "id" });
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const [user] = await this.list({ username });
    return user ?? null;
  }

  override async insert(user: NewUser): Promise<UserRecord> {
    try {
      const { rows } = await this.pool.query<Row>(
        `INSERT INTO users
         (username, email, first_name, last_name, role, password_hash, created_at, updated_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
         RETURNING *`,
        [
          user.username,
          user.email,
          user.first_name,
          user.last_name,
          user.role,
          user.password_hash,
          user.created_at,
          user.updated_at,
        ]
      );
      return toEntity(UserRecordSchema, rows[0] ?? {});
    } catch (err) {
      throw translateDbError(err);
    }
  }
}

export class MemoryUserStore implements UserStore {
  readonly key = "id";
  private readonly table: MemoryTable<UserRecord, "id">;
  private nextId = 1;

  constructor(db: MemoryDatabase) {
    this.table = new MemoryTable(db, { table: "users", key: "id" });
  }

  list(where?: Partial<UserRecord>): Promise<UserRecord[]> {
    return this.table.list(where);
  }

  get(id: number): Promise<UserRecord | null> {
    return this.table.get(id);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const [user] = await this.table.list({ username });
    return user ?? null;
  }

  async insert(user: NewUser): Promise<UserRecord> {
    const saved = await this.table.insert({ ...user, id: this.nextId });
    this.nextId += 1;
    return saved;
  }

  update(id: number, user: UserRecord): Promise<UserRecord | null> {
    return this.table.update(id, user);
  }

  delete(id: number): Promise<boolean> {
    return this.table.delete(id);
  }
}
