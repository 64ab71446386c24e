import type { FastifyInstance } from "fastify";
import { StaffAttendanceInputSchema, StaffAttendancePatchSchema } from "@lasercare/shared-schemas";
import type { AttendanceService } from "../../services/identity/attendanceService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { SearchQuerySchema, parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = { attendance: AttendanceService; guard: Guard };

const ENTITY = "staff attendance";

export function registerAttendanceRoutes(app: FastifyInstance, { attendance, guard }: Deps) {
  app.get("/admin/staff-attendance/active", { preHandler: guard.admin }, async () => attendance.active());

  registerAdminCrud(app, guard, {
    path: "/admin/staff-attendance",
    param: "id",
    service: attendance,
    inputSchema: StaffAttendanceInputSchema,
    patchSchema: StaffAttendancePatchSchema,
    key: (params) => uuidParam(params, ENTITY),
    list: (query) => attendance.search(parseQuery(SearchQuerySchema, query).search),
  });

  const staff = { preHandler: guard.role("STAFF", "Only staff members can access their attendance records.") };

  app.get("/operator/staff-attendance", staff, async (req) => attendance.listOwn(requirePrincipal(req)));

  app.get("/operator/staff-attendance/:id", staff, async (req) => {
    return attendance.getOwn(requirePrincipal(req), uuidParam(req.params, ENTITY));
  });
}
