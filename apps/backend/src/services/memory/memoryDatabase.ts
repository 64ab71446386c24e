import { RELATIONS, UNIQUE_CONSTRAINTS, type TableName } from "../../db/constraints.js";
import { missingReference, protectedDelete, uniqueViolation } from "../../db/errors.js";
import type { Row, Table } from "../../db/table.js";

interface MemorySource {
  readonly name: TableName;
  has(key: unknown): boolean;
  keysReferencing(column: string, value: unknown, many: boolean): unknown[];
  remove(key: unknown): void;
  detach(column: string, value: unknown, many: boolean): void;
}

/**
 * In-process stand-in for the Postgres schema. Tables register here so that
 * references, unique constraints and delete policies from db/constraints.ts
 * hold across tables the same way the database enforces them.
 */
export class MemoryDatabase {
  private readonly sources = new Map<TableName, MemorySource>();

  register(source: MemorySource): void {
    this.sources.set(source.name, source);
  }

  checkReferences(table: TableName, row: Row): void {
    for (const relation of RELATIONS) {
      if (relation.child !== table) continue;
      const value = row[relation.column];
      const keys = relation.many ? (Array.isArray(value) ? value : []) : [value];
      const parent = this.sources.get(relation.parent);
      for (const key of keys) {
        if (key === null || key === undefined) continue;
        if (!parent || !parent.has(key)) throw missingReference(relation);
      }
    }
  }

  checkUnique(table: TableName, row: Row, others: Iterable<Row>): void {
    const constraints = UNIQUE_CONSTRAINTS.filter((u) => u.table === table);
    if (constraints.length === 0) return;
    const existing = [...others];
    for (const constraint of constraints) {
      const values = constraint.columns.map((c) => row[c]);
      // Postgres treats NULLs as distinct.
      if (values.some((v) => v === null || v === undefined)) continue;
      const clash = existing.some((other) =>
        constraint.columns.every((c, i) => other[c] === values[i])
      );
      if (clash) throw uniqueViolation(constraint);
    }
  }

  // Plans the whole cascade first so a PROTECT anywhere leaves every table untouched.
  delete(table: TableName, key: unknown): void {
    const steps: Array<() => void> = [];
    this.plan(table, key, steps);
    for (const step of steps) step();
  }

  private plan(table: TableName, key: unknown, steps: Array<() => void>): void {
    for (const relation of RELATIONS) {
      if (relation.parent !== table) continue;
      const child = this.sources.get(relation.child);
      if (!child) continue;
      const dependents = child.keysReferencing(relation.column, key, relation.many ?? false);
      if (dependents.length === 0) continue;
      switch (relation.onDelete) {
        case "PROTECT":
          throw protectedDelete(relation);
        case "CASCADE":
          for (const dependent of dependents) this.plan(relation.child, dependent, steps);
          break;
        case "SET NULL":
        case "UNLINK":
          steps.push(() => child.detach(relation.column, key, relation.many ?? false));
          break;
      }
    }
    const source = this.sources.get(table);
    if (source) steps.push(() => source.remove(key));
  }
}

export type MemoryTableConfig<T extends Row, K extends keyof T & string> = {
  table: TableName;
  key: K;
  // Rewrites a row when a SET NULL or UNLINK parent is deleted.
  detach?: Partial<Record<string, (row: T, value: unknown) => T>>;
};

export class MemoryTable<T extends Row, K extends keyof T & string>
  implements Table<T, K>, MemorySource
{
  readonly key: K;
  readonly name: TableName;
  private readonly rows = new Map<unknown, T>();

  constructor(
    private readonly db: MemoryDatabase,
    private readonly config: MemoryTableConfig<T, K>
  ) {
    this.key = config.key;
    this.name = config.table;
    db.register(this);
  }

  async list(where: Partial<T> = {}): Promise<T[]> {
    const filters = Object.entries(where).filter(([, v]) => v !== undefined);
    return [...this.rows.values()].filter((row) => filters.every(([k, v]) => row[k] === v));
  }

  async get(key: T[K]): Promise<T | null> {
    return this.rows.get(key) ?? null;
  }

  async insert(row: T): Promise<T> {
    this.db.checkReferences(this.name, row);
    this.db.checkUnique(this.name, row, this.rows.values());
    this.rows.set(row[this.key], row);
    return row;
  }

  async update(key: T[K], row: T): Promise<T | null> {
    if (!this.rows.has(key)) return null;
    this.db.checkReferences(this.name, row);
    const others = [...this.rows.entries()].filter(([k]) => k !== key).map(([, r]) => r);
    this.db.checkUnique(this.name, row, others);
    this.rows.set(key, row);
    return row;
  }

  async delete(key: T[K]): Promise<boolean> {
    if (!this.rows.has(key)) return false;
    this.db.delete(this.name, key);
    return true;
  }

  /** Synchronous read for multi-row updates that must not interleave with other requests. */
  peek(key: T[K]): T | undefined {
    return this.rows.get(key);
  }

  /** Synchronous write of an existing row; callers have already validated it. */
  put(row: T): void {
    this.rows.set(row[this.key], row);
  }

  has(key: unknown): boolean {
    return this.rows.has(key);
  }

  keysReferencing(column: string, value: unknown, many: boolean): unknown[] {
    const keys: unknown[] = [];
    for (const [key, row] of this.rows) {
      const cell = row[column];
      const hit = many ? Array.isArray(cell) && cell.includes(value) : cell === value;
      if (hit) keys.push(key);
    }
    return keys;
  }

  remove(key: unknown): void {
    this.rows.delete(key);
  }

  detach(column: string, value: unknown, many: boolean): void {
    const rewrite = this.config.detach?.[column];
    if (!rewrite) throw new Error(`No detach rule for ${this.name}.${column}`);
    for (const key of this.keysReferencing(column, value, many)) {
      const row = this.rows.get(key);
      if (row) this.rows.set(key, rewrite(row, value));
    }
  }
}
