import type { FastifyInstance } from "fastify";
import {
  AreaScheduleInputSchema,
  AreaSchedulePatchSchema,
  TreatmentAreaInputSchema,
  TreatmentAreaPatchSchema,
} from "@lasercare/shared-schemas";
import type { AreaScheduleService, TreatmentAreaService } from "../../services/catalog/catalogService.js";
import type { Guard } from "../auth/guard.js";
import { SearchQuerySchema, keyParam, parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = {
  treatmentAreas: TreatmentAreaService;
  areaSchedules: AreaScheduleService;
  guard: Guard;
};

export function registerCatalogRoutes(app: FastifyInstance, { treatmentAreas, areaSchedules, guard }: Deps) {
  registerAdminCrud(app, guard, {
    path: "/admin/treatment-areas",
    param: "name",
    service: treatmentAreas,
    inputSchema: TreatmentAreaInputSchema,
    patchSchema: TreatmentAreaPatchSchema,
    key: (params) => keyParam(params, "name", "treatment area"),
    list: (query) => treatmentAreas.search(parseQuery(SearchQuerySchema, query).search),
    deletable: true,
  });

  registerAdminCrud(app, guard, {
    path: "/admin/area-schedules",
    param: "id",
    service: areaSchedules,
    inputSchema: AreaScheduleInputSchema,
    patchSchema: AreaSchedulePatchSchema,
    key: (params) => uuidParam(params, "area schedule"),
    list: (query) => areaSchedules.search(parseQuery(SearchQuerySchema, query).search),
  });

  const authenticated = { preHandler: guard.authenticated };

  app.get("/treatment-areas", authenticated, async () => treatmentAreas.listActive());

  app.get("/treatment-areas/:name", authenticated, async (req) => {
    return treatmentAreas.getActive(keyParam(req.params, "name", "treatment area"));
  });

  app.get("/area-schedules", authenticated, async () => areaSchedules.active());

  app.get("/area-schedules/active", authenticated, async () => areaSchedules.active());

  app.get("/area-schedules/:id", authenticated, async (req) => {
    return areaSchedules.getActive(uuidParam(req.params, "area schedule"));
  });
}
