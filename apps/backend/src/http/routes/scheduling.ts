import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  CancellationPeriodInputSchema,
  CancellationPeriodPatchSchema,
  DateQuerySchema,
  DateSchema,
  OperatorShiftInputSchema,
  OperatorShiftPatchSchema,
  ReservationSlotInputSchema,
  ReservationSlotPatchSchema,
} from "@lasercare/shared-schemas";
import type {
  CancellationPeriodService,
  ShiftService,
  SlotService,
} from "../../services/scheduling/schedulingService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = {
  shifts: ShiftService;
  slots: SlotService;
  cancellationPeriods: CancellationPeriodService;
  guard: Guard;
};

const OptionalDateQuerySchema = z.object({ date: DateSchema.optional() });

export function registerSchedulingRoutes(
  app: FastifyInstance,
  { shifts, slots, cancellationPeriods, guard }: Deps
) {
  const authenticated = { preHandler: guard.authenticated };

  registerAdminCrud(app, guard, {
    path: "/admin/slots",
    param: "id",
    service: slots,
    inputSchema: ReservationSlotInputSchema,
    patchSchema: ReservationSlotPatchSchema,
    key: (params) => uuidParam(params, "reservation slot"),
    list: (query) => slots.byDate(parseQuery(OptionalDateQuerySchema, query).date),
  });

  app.get("/slots", authenticated, async () => slots.list());

  app.get("/slots/available", authenticated, async (req) => {
    const { date } = parseQuery(DateQuerySchema, req.query);
    return slots.available(date);
  });

  app.get("/slots/:id", authenticated, async (req) => slots.get(uuidParam(req.params, "reservation slot")));

  registerAdminCrud(app, guard, {
    path: "/admin/shifts",
    param: "id",
    service: shifts,
    inputSchema: OperatorShiftInputSchema,
    patchSchema: OperatorShiftPatchSchema,
    key: (params) => uuidParam(params, "operator shift"),
    list: (query) => shifts.byDate(parseQuery(OptionalDateQuerySchema, query).date),
  });

  const staff = { preHandler: guard.role("STAFF", "Only staff members can access their shifts.") };

  app.get("/shifts", staff, async (req) => shifts.listOwn(requirePrincipal(req)));

  app.get("/shifts/active", staff, async (req) => shifts.activeOwn(requirePrincipal(req)));

  app.get("/shifts/:id", staff, async (req) => {
    return shifts.getOwn(requirePrincipal(req), uuidParam(req.params, "operator shift"));
  });

  app.get("/admin/cancellation-periods/active", { preHandler: guard.admin }, async () =>
    cancellationPeriods.active()
  );

  registerAdminCrud(app, guard, {
    path: "/admin/cancellation-periods",
    param: "id",
    service: cancellationPeriods,
    inputSchema: CancellationPeriodInputSchema,
    patchSchema: CancellationPeriodPatchSchema,
    key: (params) => uuidParam(params, "cancellation period"),
    list: () => cancellationPeriods.list(),
  });

  app.get("/cancellation-periods", authenticated, async () => cancellationPeriods.list());

  app.get("/cancellation-periods/:id", authenticated, async (req) => {
    return cancellationPeriods.get(uuidParam(req.params, "cancellation period"));
  });
}
