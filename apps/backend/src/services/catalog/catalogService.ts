import { randomUUID } from "node:crypto";
import type {
  AreaSchedule,
  AreaScheduleInput,
  AreaSchedulePatch,
  TreatmentArea,
  TreatmentAreaInput,
  TreatmentAreaPatch,
} from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import { roundMoney } from "../../domain/money.js";
import { checkAreaSchedule, checkTreatmentArea } from "../../domain/rules.js";
import { EntityService, notFound, type ServiceContext } from "../entityService.js";
import { matchesSearch } from "../search.js";

export class TreatmentAreaService extends EntityService<
  TreatmentArea,
  "name",
  TreatmentAreaInput,
  TreatmentAreaPatch
> {
  constructor(table: Table<TreatmentArea, "name">, ctx: ServiceContext) {
    super(
      table,
      {
        entity: "treatment area",
        build: (input, now) => ({
          name: input.name,
          current_price: roundMoney(input.current_price ?? 0),
          deadline_reset: input.deadline_reset ?? 30,
          is_active: input.is_active ?? true,
          operate_time: input.operate_time ?? 5,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({
          ...existing,
          ...patch,
          current_price: roundMoney(patch.current_price ?? existing.current_price),
        }),
        check: (row) => checkTreatmentArea(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<TreatmentArea[]> {
    const rows = await this.list();
    return rows.filter((r) => matchesSearch(term, [r.name]));
  }

  listActive(): Promise<TreatmentArea[]> {
    return this.list({ is_active: true });
  }

  async getActive(name: string): Promise<TreatmentArea> {
    const area = await this.find(name);
    if (!area || !area.is_active) throw notFound("treatment area");
    return area;
  }
}

export class AreaScheduleService extends EntityService<
  AreaSchedule,
  "id",
  AreaScheduleInput,
  AreaSchedulePatch
> {
  constructor(table: Table<AreaSchedule, "id">, ctx: ServiceContext) {
    super(
      table,
      {
        entity: "area schedule",
        build: (input, now) => ({
          id: randomUUID(),
          treatment_area: input.treatment_area,
          price: roundMoney(input.price ?? 0),
          start_time: input.start_time ?? null,
          end_time: input.end_time ?? null,
          operate_time: input.operate_time ?? 5,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({
          ...existing,
          ...patch,
          price: roundMoney(patch.price ?? existing.price),
        }),
        check: (row) => checkAreaSchedule(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<AreaSchedule[]> {
    const rows = await this.list();
    return rows.filter((r) => matchesSearch(term, [r.treatment_area]));
  }

  // Schedules with a start time set are the ones open for booking.
  async active(): Promise<AreaSchedule[]> {
    const rows = await this.list();
    return rows.filter((r) => r.start_time !== null);
  }

  async getActive(id: string): Promise<AreaSchedule> {
    const schedule = await this.find(id);
    if (!schedule || schedule.start_time === null) throw notFound("area schedule");
    return schedule;
  }
}
