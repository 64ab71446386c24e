import { randomUUID } from "node:crypto";
import type {
  StaffAttendance,
  StaffAttendanceInput,
  StaffAttendancePatch,
} from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import { checkStaffAttendance } from "../../domain/rules.js";
import type { Principal } from "../auth/principal.js";
import { EntityService, notFound, type ServiceContext } from "../entityService.js";
import { matchesSearch, usernamesById } from "../search.js";
import type { UserStore } from "./userStore.js";

export class AttendanceService extends EntityService<
  StaffAttendance,
  "id",
  StaffAttendanceInput,
  StaffAttendancePatch
> {
  constructor(
    table: Table<StaffAttendance, "id">,
    private readonly users: UserStore,
    ctx: ServiceContext
  ) {
    super(
      table,
      {
        entity: "staff attendance",
        build: (input, now) => ({
          id: randomUUID(),
          user_id: input.user_id,
          entry_timestamp: input.entry_timestamp ?? null,
          exit_timestamp: input.exit_timestamp ?? null,
          has_exited: input.has_exited ?? false,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        check: (row) => checkStaffAttendance(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<StaffAttendance[]> {
    const [rows, names] = await Promise.all([this.list(), usernamesById(this.users)]);
    return rows.filter((r) => matchesSearch(term, [names.get(r.user_id)]));
  }

  active(): Promise<StaffAttendance[]> {
    return this.list({ has_exited: false });
  }

  listOwn(principal: Principal): Promise<StaffAttendance[]> {
    return this.list({ user_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<StaffAttendance> {
    const row = await this.find(id);
    if (!row || row.user_id !== principal.id) throw notFound("staff attendance");
    return row;
  }
}
