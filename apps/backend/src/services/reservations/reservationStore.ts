import type pg from "pg";
import { ReservationSchema, type Reservation } from "@lasercare/shared-schemas";
import { withClient } from "../../db/pool.js";
import { withTransaction } from "../../db/tx.js";
import { translateDbError } from "../../db/errors.js";
import { toEntity, type Row, type Table } from "../../db/table.js";

export type ReservationStore = Table<Reservation, "id">;

// Persisted on the reservations row; area_schedule_ids live in the link table.
const ROW_COLUMNS = [
  "id",
  "user_id",
  "slot_id",
  "treatment_area",
  "session_number",
  "reservation_type",
  "is_online",
  "is_charged",
  "is_paid",
  "used_discount_code",
  "total_price",
  "final_amount",
  "discount_code",
  "reservation_timestamp",
  "request_timestamp",
  "created_at",
  "updated_at",
] as const;

const SELECT_RESERVATIONS = `
  SELECT r.*,
         COALESCE(
           array_agg(l.area_schedule_id::text ORDER BY l.area_schedule_id)
             FILTER (WHERE l.area_schedule_id IS NOT NULL),
           '{}'
         ) AS area_schedule_ids
  FROM reservations r
  LEFT JOIN reservation_area_schedules l ON l.reservation_id = r.id`;

export class PgReservationStore implements ReservationStore {
  readonly key = "id";

  constructor(private readonly pool: pg.Pool) {}

  async list(where: Partial<Reservation> = {}): Promise<Reservation[]> {
    const clauses: string[] = [];
    const values: unknown[] = [];
    for (const column of ROW_COLUMNS) {
      const value = where[column];
      if (value === undefined) continue;
      if (value === null) {
        clauses.push(`r.${column} IS NULL`);
      } else {
        values.push(value);
        clauses.push(`r.${column} = $${values.length}`);
      }
    }
    const filter = clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "";
    const { rows } = await this.pool.query<Row>(
      `${SELECT_RESERVATIONS}${filter} GROUP BY r.id ORDER BY r.created_at`,
      values
    );
    return rows.map((r) => toEntity(ReservationSchema, r));
  }

  async get(id: string): Promise<Reservation | null> {
    return withClient(this.pool, (client) => this.fetch(client, id));
  }

  async insert(reservation: Reservation): Promise<Reservation> {
    try {
      return await withTransaction(this.pool, async (client) => {
        await client.query(
          `INSERT INTO reservations (${ROW_COLUMNS.join(", ")})
           VALUES (${ROW_COLUMNS.map((_, i) => `$${i + 1}`).join(", ")})`,
          ROW_COLUMNS.map((c) => reservation[c])
        );
        await this.writeLinks(client, reservation.id, reservation.area_schedule_ids);
        return this.require(client, reservation.id);
      });
    } catch (err) {
      throw translateDbError(err);
    }
  }

  async update(id: string, reservation: Reservation): Promise<Reservation | null> {
    const columns = ROW_COLUMNS.filter((c) => c !== "id" && c !== "created_at");
    try {
      return await withTransaction(this.pool, async (client) => {
        const { rowCount } = await client.query(
          `UPDATE reservations
           SET ${columns.map((c, i) => `${c} = $${i + 1}`).join(", ")}
           WHERE id = $${columns.length + 1}`,
          [...columns.map((c) => reservation[c]), id]
        );
        if (!rowCount) return null;
        await client.query(`DELETE FROM reservation_area_schedules WHERE reservation_id = $1`, [id]);
        await this.writeLinks(client, id, reservation.area_schedule_ids);
        return this.require(client, id);
      });
    } catch (err) {
      throw translateDbError(err);
    }
  }

  async delete(id: string): Promise<boolean> {
    try {
      const { rowCount } = await this.pool.query(`DELETE FROM reservations WHERE id = $1`, [id]);
      return (rowCount ?? 0) > 0;
    } catch (err) {
      throw translateDbError(err);
    }
  }

  private async writeLinks(client: pg.PoolClient, id: string, scheduleIds: string[]): Promise<void> {
    if (scheduleIds.length === 0) return;
    await client.query(
      `INSERT INTO reservation_area_schedules (reservation_id, area_schedule_id)
       SELECT $1::uuid, unnest($2::uuid[])`,
      [id, scheduleIds]
    );
  }

  private async require(client: pg.PoolClient, id: string): Promise<Reservation> {
    const reservation = await this.fetch(client, id);
    if (!reservation) throw new Error(`Reservation ${id} vanished inside its own transaction`);
    return reservation;
  }

  private async fetch(client: pg.PoolClient, id: string): Promise<Reservation | null> {
    const { rows } = await client.query<Row>(`${SELECT_RESERVATIONS} WHERE r.id = $1 GROUP BY r.id`, [id]);
    const row = rows[0];
    return row ? toEntity(ReservationSchema, row) : null;
  }
}
