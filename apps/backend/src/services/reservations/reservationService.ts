import { randomUUID } from "node:crypto";
import type {
  PreReservation,
  PreReservationInput,
  PreReservationPatch,
  Reservation,
  ReservationInput,
  ReservationPatch,
  ReservationSlot,
} from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import { roundMoney } from "../../domain/money.js";
import { checkPreReservation, checkReservation } from "../../domain/rules.js";
import type { Principal } from "../auth/principal.js";
import { EntityService, notFound, type ServiceContext } from "../entityService.js";
import type { UserStore } from "../identity/userStore.js";
import { matchesSearch, usernamesById } from "../search.js";
import type { ReservationStore } from "./reservationStore.js";

const ENTITY = "reservation";

export type CustomerReservationInput = Omit<ReservationInput, "user_id">;

export class ReservationService extends EntityService<Reservation, "id", ReservationInput, ReservationPatch> {
  constructor(
    table: ReservationStore,
    private readonly slots: Table<ReservationSlot, "id">,
    private readonly users: UserStore,
    ctx: ServiceContext
  ) {
    super(
      table,
      {
        entity: ENTITY,
        build: (input, now) => ({
          id: randomUUID(),
          user_id: input.user_id,
          slot_id: input.slot_id,
          treatment_area: input.treatment_area ?? null,
          area_schedule_ids: [...new Set(input.area_schedule_ids ?? [])],
          session_number: input.session_number,
          reservation_type: input.reservation_type ?? "STANDARD",
          is_online: input.is_online ?? true,
          is_charged: input.is_charged ?? false,
          is_paid: input.is_paid ?? false,
          used_discount_code: input.used_discount_code ?? false,
          total_price: roundMoney(input.total_price),
          final_amount: roundMoney(input.final_amount),
          discount_code: input.discount_code ?? null,
          reservation_timestamp: input.reservation_timestamp ?? null,
          request_timestamp: input.request_timestamp ?? null,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({
          ...existing,
          ...patch,
          area_schedule_ids: patch.area_schedule_ids
            ? [...new Set(patch.area_schedule_ids)]
            : existing.area_schedule_ids,
          total_price: roundMoney(patch.total_price ?? existing.total_price),
          final_amount: roundMoney(patch.final_amount ?? existing.final_amount),
        }),
        check: (row) => checkReservation(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<Reservation[]> {
    const [rows, names] = await Promise.all([this.list(), usernamesById(this.users)]);
    return rows.filter((r) => matchesSearch(term, [names.get(r.user_id)]));
  }

  unpaid(): Promise<Reservation[]> {
    return this.list({ is_paid: false });
  }

  createOwn(principal: Principal, input: CustomerReservationInput): Promise<Reservation> {
    return this.create({ ...input, user_id: principal.id });
  }

  listOwn(principal: Principal): Promise<Reservation[]> {
    return this.list({ user_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<Reservation> {
    const row = await this.find(id);
    if (!row || row.user_id !== principal.id) throw notFound(ENTITY);
    return row;
  }

  // Operators see reservations booked into slots they are assigned to.
  async listForOperator(principal: Principal): Promise<Reservation[]> {
    const [slots, rows] = await Promise.all([
      this.slots.list({ operator_id: principal.id }),
      this.list(),
    ]);
    const own = new Set(slots.map((s) => s.id));
    return rows.filter((r) => own.has(r.slot_id));
  }

  async getForOperator(principal: Principal, id: string): Promise<Reservation> {
    const row = await this.find(id);
    const slot = row ? await this.slots.get(row.slot_id) : null;
    if (!row || !slot || slot.operator_id !== principal.id) throw notFound(ENTITY);
    return row;
  }

  async markComplete(principal: Principal, id: string): Promise<Reservation> {
    await this.getForOperator(principal, id);
    return this.update(id, { is_charged: true });
  }
}

export class PreReservationService extends EntityService<
  PreReservation,
  "id",
  PreReservationInput,
  PreReservationPatch
> {
  constructor(
    table: Table<PreReservation, "id">,
    private readonly users: UserStore,
    ctx: ServiceContext
  ) {
    super(
      table,
      {
        entity: "pre-reservation",
        build: (input, now) => ({
          id: randomUUID(),
          user_id: input.user_id,
          area_schedule_id: input.area_schedule_id,
          session_count: input.session_count,
          last_session_date: input.last_session_date,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        check: (row) => checkPreReservation(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<PreReservation[]> {
    const [rows, names] = await Promise.all([this.list(), usernamesById(this.users)]);
    return rows.filter((r) => matchesSearch(term, [names.get(r.user_id)]));
  }

  listOwn(principal: Principal): Promise<PreReservation[]> {
    return this.list({ user_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<PreReservation> {
    const row = await this.find(id);
    if (!row || row.user_id !== principal.id) throw notFound("pre-reservation");
    return row;
  }
}
