import type { FastifyInstance } from "fastify";
import {
  CustomerProfileInputSchema,
  CustomerProfilePatchSchema,
  OwnCustomerProfilePatchSchema,
} from "@lasercare/shared-schemas";
import type { CustomerProfileService } from "../../services/identity/customerProfileService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { SearchQuerySchema, parseBody, parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = { customerProfiles: CustomerProfileService; guard: Guard };

const ENTITY = "customer profile";

export function registerCustomerProfileRoutes(app: FastifyInstance, { customerProfiles, guard }: Deps) {
  registerAdminCrud(app, guard, {
    path: "/admin/customer-profiles",
    param: "id",
    service: customerProfiles,
    inputSchema: CustomerProfileInputSchema,
    patchSchema: CustomerProfilePatchSchema,
    key: (params) => uuidParam(params, ENTITY),
    list: (query) => customerProfiles.search(parseQuery(SearchQuerySchema, query).search),
  });

  const customer = { preHandler: guard.role("CUSTOMER", "Only customers can access their profile.") };

  app.get("/customer-profiles", customer, async (req) => customerProfiles.listOwn(requirePrincipal(req)));

  app.get("/customer-profiles/:id", customer, async (req) => {
    return customerProfiles.getOwn(requirePrincipal(req), uuidParam(req.params, ENTITY));
  });

  app.patch("/customer-profiles/:id", customer, async (req) => {
    const principal = requirePrincipal(req);
    const id = uuidParam(req.params, ENTITY);
    return customerProfiles.updateOwn(principal, id, parseBody(OwnCustomerProfilePatchSchema, req.body));
  });
}
