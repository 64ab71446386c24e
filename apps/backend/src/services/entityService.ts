import type { Row, Table } from "../db/table.js";
import { HttpError, NotFoundError, ValidationError } from "../http/errors.js";
import type { Logger } from "../observability/logger.js";

export type ServiceContext = {
  log: Logger;
  clock: () => Date;
};

export type EntityHooks<T extends Row, Input, Patch> = {
  /** Lower-case entity name used in log lines and error messages. */
  entity: string;
  build(input: Input, now: Date): T;
  merge(existing: T, patch: Patch): T;
  /** Fills derived fields on the merged row before it is checked. */
  prepare?(row: T): Promise<T>;
  check(row: T, previous: T | null, now: Date): void;
};

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function notFound(entity: string): NotFoundError {
  return new NotFoundError(`${capitalize(entity)} not found`);
}

/** Logs a write's outcome; unexpected failures surface as a generic validation error. */
export async function runWrite<R>(
  ctx: ServiceContext,
  entity: string,
  action: string,
  fn: () => Promise<R>
): Promise<R> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof HttpError) {
      ctx.log.warn({ entity, status: err.statusCode }, `${entity} ${action} rejected`);
      throw err;
    }
    ctx.log.error({ err, entity }, `failed to ${action} ${entity}`);
    throw ValidationError.form(`Failed to ${action} ${entity}`);
  }
}

/**
 * Create/retrieve/update/list/delete over one table. Every write runs the
 * entity's check on the full row and logs the outcome; unexpected failures
 * are logged and re-raised as a generic validation error.
 */
export class EntityService<T extends Row, K extends keyof T & string, Input, Patch> {
  constructor(
    readonly table: Table<T, K>,
    protected readonly hooks: EntityHooks<T, Input, Patch>,
    protected readonly ctx: ServiceContext
  ) {}

  list(where?: Partial<T>): Promise<T[]> {
    return this.table.list(where);
  }

  find(key: T[K]): Promise<T | null> {
    return this.table.get(key);
  }

  async get(key: T[K]): Promise<T> {
    const row = await this.table.get(key);
    if (!row) throw notFound(this.hooks.entity);
    return row;
  }

  async create(input: Input): Promise<T> {
    return this.write("create", async () => {
      const now = this.ctx.clock();
      const row = await this.prepare(this.hooks.build(input, now));
      this.hooks.check(row, null, now);
      const saved = await this.table.insert(row);
      this.ctx.log.info({ entity: this.hooks.entity, key: saved[this.table.key] }, `${this.hooks.entity} created`);
      return saved;
    });
  }

  async update(key: T[K], patch: Patch): Promise<T> {
    return this.write("update", async () => {
      const existing = await this.get(key);
      const now = this.ctx.clock();
      const merged = this.hooks.merge(existing, patch);
      if (merged[this.table.key] !== key) {
        throw ValidationError.field(this.table.key, "This field cannot be changed.");
      }
      const row = await this.prepare({ ...merged, updated_at: now.toISOString() });
      this.hooks.check(row, existing, now);
      const saved = await this.table.update(key, row);
      if (!saved) throw notFound(this.hooks.entity);
      this.ctx.log.info({ entity: this.hooks.entity, key }, `${this.hooks.entity} updated`);
      return saved;
    });
  }

  async remove(key: T[K]): Promise<void> {
    await this.write("delete", async () => {
      const deleted = await this.table.delete(key);
      if (!deleted) throw notFound(this.hooks.entity);
      this.ctx.log.info({ entity: this.hooks.entity, key }, `${this.hooks.entity} deleted`);
    });
  }

  private prepare(row: T): Promise<T> {
    return this.hooks.prepare ? this.hooks.prepare(row) : Promise.resolve(row);
  }

  protected write<R>(action: string, fn: () => Promise<R>): Promise<R> {
    return runWrite(this.ctx, this.hooks.entity, action, fn);
  }
}
