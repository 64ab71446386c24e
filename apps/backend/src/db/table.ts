import type pg from "pg";
import type { z } from "zod";
import type { TableName } from "./constraints.js";
import { translateDbError } from "./errors.js";

export type Row = Record<string, unknown>;

/** Keyed row storage shared by the Postgres and in-memory drivers. */
export interface Table<T extends Row, K extends keyof T & string> {
  readonly key: K;
  list(where?: Partial<T>): Promise<T[]>;
  get(key: T[K]): Promise<T | null>;
  insert(row: T): Promise<T>;
  update(key: T[K], row: T): Promise<T | null>;
  delete(key: T[K]): Promise<boolean>;
}

export type PgTableConfig<T extends Row, K extends keyof T & string> = {
  table: TableName;
  key: K;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  columns: readonly (keyof T & string)[];
  orderBy?: string;
};

export function toEntity<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: Row): T {
  const normalized: Row = {};
  for (const [column, value] of Object.entries(raw)) {
    normalized[column] = value instanceof Date ? value.toISOString() : value;
  }
  return schema.parse(normalized);
}

export class PgTable<T extends Row, K extends keyof T & string> implements Table<T, K> {
  readonly key: K;

  constructor(
    protected readonly pool: pg.Pool,
    protected readonly config: PgTableConfig<T, K>
  ) {
    this.key = config.key;
  }

  async list(where: Partial<T> = {}): Promise<T[]> {
    const clauses: string[] = [];
    const values: unknown[] = [];
    for (const column of this.config.columns) {
      const value = where[column];
      if (value === undefined) continue;
      if (value === null) {
        clauses.push(`${column} IS NULL`);
      } else {
        values.push(value);
        clauses.push(`${column} = $${values.length}`);
      }
    }
    const filter = clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "";
    const order = ` ORDER BY ${this.config.orderBy ?? "created_at"}`;
    const { rows } = await this.pool.query<Row>(
      `SELECT * FROM ${this.config.table}${filter}${order}`,
      values
    );
    return rows.map((r) => this.toEntity(r));
  }

  async get(key: T[K]): Promise<T | null> {
    const { rows } = await this.pool.query<Row>(
      `SELECT * FROM ${this.config.table} WHERE ${this.key} = $1`,
      [key]
    );
    const row = rows[0];
    return row ? this.toEntity(row) : null;
  }

  async insert(row: T): Promise<T> {
    const columns = this.config.columns;
    const placeholders = columns.map((_, i) => `$${i + 1}`);
    try {
      const { rows } = await this.pool.query<Row>(
        `INSERT INTO ${this.config.table} (${columns.join(", ")})
         VALUES (${placeholders.join(", ")})
         RETURNING *`,
        columns.map((c) => row[c])
      );
      return this.toEntity(rows[0] ?? {});
    } catch (err) {
      throw translateDbError(err);
    }
  }

  async update(key: T[K], row: T): Promise<T | null> {
    const columns = this.config.columns.filter((c) => c !== this.key && c !== "created_at");
    const assignments = columns.map((c, i) => `${c} = $${i + 1}`);
    try {
      const { rows } = await this.pool.query<Row>(
        `UPDATE ${this.config.table}
         SET ${assignments.join(", ")}
         WHERE ${this.key} = $${columns.length + 1}
         RETURNING *`,
        [...columns.map((c) => row[c]), key]
      );
      const updated = rows[0];
      return updated ? this.toEntity(updated) : null;
    } catch (err) {
      throw translateDbError(err);
    }
  }

  async delete(key: T[K]): Promise<boolean> {
    try {
      const { rowCount } = await this.pool.query(
        `DELETE FROM ${this.config.table} WHERE ${this.key} = $1`,
        [key]
      );
      return (rowCount ?? 0) > 0;
    } catch (err) {
      throw translateDbError(err);
    }
  }

  protected toEntity(raw: Row): T {
    return toEntity(this.config.schema, raw);
  }
}
