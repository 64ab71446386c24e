import type { FastifyInstance } from "fastify";
import {
  CustomerReservationInputSchema,
  PreReservationInputSchema,
  PreReservationPatchSchema,
  ReservationInputSchema,
  ReservationPatchSchema,
} from "@lasercare/shared-schemas";
import type {
  PreReservationService,
  ReservationService,
} from "../../services/reservations/reservationService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { SearchQuerySchema, parseBody, parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = {
  reservations: ReservationService;
  preReservations: PreReservationService;
  guard: Guard;
};

export function registerReservationRoutes(
  app: FastifyInstance,
  { reservations, preReservations, guard }: Deps
) {
  app.get("/admin/reservations/unpaid", { preHandler: guard.admin }, async () => reservations.unpaid());

  registerAdminCrud(app, guard, {
    path: "/admin/reservations",
    param: "id",
    service: reservations,
    inputSchema: ReservationInputSchema,
    patchSchema: ReservationPatchSchema,
    key: (params) => uuidParam(params, "reservation"),
    list: (query) => reservations.search(parseQuery(SearchQuerySchema, query).search),
  });

  const customer = {
    preHandler: guard.role("CUSTOMER", "Only customers can access or create reservations."),
  };

  app.post("/reservations", customer, async (req, reply) => {
    const principal = requirePrincipal(req);
    const created = await reservations.createOwn(principal, parseBody(CustomerReservationInputSchema, req.body));
    reply.code(201);
    return created;
  });

  app.get("/reservations", customer, async (req) => reservations.listOwn(requirePrincipal(req)));

  app.get("/reservations/:id", customer, async (req) => {
    return reservations.getOwn(requirePrincipal(req), uuidParam(req.params, "reservation"));
  });

  const operator = {
    preHandler: guard.role("STAFF", "Only staff members can access assigned reservations."),
  };

  app.get("/operator/reservations", operator, async (req) => {
    return reservations.listForOperator(requirePrincipal(req));
  });

  app.get("/operator/reservations/:id", operator, async (req) => {
    return reservations.getForOperator(requirePrincipal(req), uuidParam(req.params, "reservation"));
  });

  app.patch("/operator/reservations/:id/mark-complete", operator, async (req) => {
    return reservations.markComplete(requirePrincipal(req), uuidParam(req.params, "reservation"));
  });

  registerAdminCrud(app, guard, {
    path: "/admin/pre-reservations",
    param: "id",
    service: preReservations,
    inputSchema: PreReservationInputSchema,
    patchSchema: PreReservationPatchSchema,
    key: (params) => uuidParam(params, "pre-reservation"),
    list: (query) => preReservations.search(parseQuery(SearchQuerySchema, query).search),
  });

  const preCustomer = {
    preHandler: guard.role("CUSTOMER", "Only customers can access their pre-reservations."),
  };

  app.get("/pre-reservations", preCustomer, async (req) => preReservations.listOwn(requirePrincipal(req)));

  app.get("/pre-reservations/:id", preCustomer, async (req) => {
    return preReservations.getOwn(requirePrincipal(req), uuidParam(req.params, "pre-reservation"));
  });
}
