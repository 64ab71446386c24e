import type { FastifyInstance } from "fastify";
import type { Services } from "../../services/index.js";
import type { Guard } from "../auth/guard.js";
import { registerAccountRoutes } from "./accounts.js";
import { registerAttendanceRoutes } from "./attendance.js";
import { registerCatalogRoutes } from "./catalog.js";
import { registerCommentRoutes } from "./comments.js";
import { registerCustomerProfileRoutes } from "./customerProfiles.js";
import { registerPaymentRoutes } from "./payments.js";
import { registerReservationRoutes } from "./reservations.js";
import { registerSchedulingRoutes } from "./scheduling.js";
import { registerUserRoutes } from "./users.js";

export const API_PREFIX = "/api/v1";

export async function registerRoutes(app: FastifyInstance, services: Services, guard: Guard) {
  await app.register(
    async (api) => {
      registerAccountRoutes(api, { accounts: services.accounts });
      registerUserRoutes(api, { users: services.users, guard });
      registerAttendanceRoutes(api, { attendance: services.attendance, guard });
      registerCustomerProfileRoutes(api, { customerProfiles: services.customerProfiles, guard });
      registerCommentRoutes(api, { comments: services.comments, guard });
      registerCatalogRoutes(api, {
        treatmentAreas: services.treatmentAreas,
        areaSchedules: services.areaSchedules,
        guard,
      });
      registerSchedulingRoutes(api, {
        shifts: services.shifts,
        slots: services.slots,
        cancellationPeriods: services.cancellationPeriods,
        guard,
      });
      registerReservationRoutes(api, {
        reservations: services.reservations,
        preReservations: services.preReservations,
        guard,
      });
      registerPaymentRoutes(api, {
        payments: services.payments,
        discountCodes: services.discountCodes,
        guard,
      });
    },
    { prefix: API_PREFIX }
  );
}
