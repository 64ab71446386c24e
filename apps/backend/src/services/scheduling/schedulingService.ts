import { randomUUID } from "node:crypto";
import type {
  CancellationPeriod,
  CancellationPeriodInput,
  CancellationPeriodPatch,
  OperatorShift,
  OperatorShiftInput,
  OperatorShiftPatch,
  ReservationSlot,
  ReservationSlotInput,
  ReservationSlotPatch,
} from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import {
  checkCancellationPeriod,
  checkOperatorShift,
  checkReservationSlot,
} from "../../domain/rules.js";
import { ValidationError } from "../../http/errors.js";
import type { Principal } from "../auth/principal.js";
import { EntityService, notFound, type ServiceContext } from "../entityService.js";
import type { UserStore } from "../identity/userStore.js";

// Calendar date of `now` in UTC, comparable with YYYY-MM-DD columns.
export function isoDay(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export class ShiftService extends EntityService<
  OperatorShift,
  "id",
  OperatorShiftInput,
  OperatorShiftPatch
> {
  constructor(table: Table<OperatorShift, "id">, users: UserStore, ctx: ServiceContext) {
    super(
      table,
      {
        entity: "operator shift",
        build: (input, now) => ({
          id: randomUUID(),
          operator_id: input.operator_id,
          operator_name: input.operator_name ?? "",
          shift_date: input.shift_date,
          period: input.period ?? "MORNING",
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        // A blank operator name is taken from the operator's username.
        prepare: async (row) => {
          const operator = await users.get(row.operator_id);
          if (!operator) throw ValidationError.field("operator_id", "Operator is required");
          return row.operator_name.trim() ? row : { ...row, operator_name: operator.username };
        },
        check: (row) => checkOperatorShift(row),
      },
      ctx
    );
  }

  byDate(date?: string): Promise<OperatorShift[]> {
    return this.list(date ? { shift_date: date } : {});
  }

  listOwn(principal: Principal): Promise<OperatorShift[]> {
    return this.list({ operator_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<OperatorShift> {
    const shift = await this.find(id);
    if (!shift || shift.operator_id !== principal.id) throw notFound("operator shift");
    return shift;
  }

  async activeOwn(principal: Principal): Promise<OperatorShift[]> {
    const today = isoDay(this.ctx.clock());
    const shifts = await this.listOwn(principal);
    return shifts.filter((s) => s.shift_date >= today);
  }
}

export class SlotService extends EntityService<
  ReservationSlot,
  "id",
  ReservationSlotInput,
  ReservationSlotPatch
> {
  constructor(table: Table<ReservationSlot, "id">, ctx: ServiceContext) {
    super(
      table,
      {
        entity: "reservation slot",
        build: (input, now) => ({
          id: randomUUID(),
          operator_id: input.operator_id,
          date: input.date,
          period: input.period,
          time_slot: input.time_slot,
          duration: input.duration ?? 30,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        check: (row) => checkReservationSlot(row),
      },
      ctx
    );
  }

  byDate(date?: string): Promise<ReservationSlot[]> {
    return this.list(date ? { date } : {});
  }

  available(date: string): Promise<ReservationSlot[]> {
    return this.list({ date });
  }
}

export class CancellationPeriodService extends EntityService<
  CancellationPeriod,
  "id",
  CancellationPeriodInput,
  CancellationPeriodPatch
> {
  constructor(table: Table<CancellationPeriod, "id">, ctx: ServiceContext) {
    super(
      table,
      {
        entity: "cancellation period",
        build: (input, now) => ({
          id: randomUUID(),
          start_time: input.start_time,
          end_time: input.end_time,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        check: (row, previous, now) => checkCancellationPeriod(row, now, previous),
      },
      ctx
    );
  }

  async active(): Promise<CancellationPeriod[]> {
    const now = this.ctx.clock().getTime();
    const rows = await this.list();
    return rows.filter((p) => Date.parse(p.end_time) >= now);
  }
}
