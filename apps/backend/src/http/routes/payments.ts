import type { FastifyInstance } from "fastify";
import {
  ApplyDiscountRequestSchema,
  CustomerPaymentInputSchema,
  DiscountCodeInputSchema,
  DiscountCodePatchSchema,
  PaymentInputSchema,
  PaymentPatchSchema,
} from "@lasercare/shared-schemas";
import type { DiscountCodeService, PaymentService } from "../../services/payments/paymentService.js";
import { requirePrincipal, type Guard } from "../auth/guard.js";
import { SearchQuerySchema, keyParam, parseBody, parseQuery, uuidParam } from "../validation.js";
import { registerAdminCrud } from "./crud.js";

type Deps = {
  payments: PaymentService;
  discountCodes: DiscountCodeService;
  guard: Guard;
};

export function registerPaymentRoutes(app: FastifyInstance, { payments, discountCodes, guard }: Deps) {
  const admin = { preHandler: guard.admin };

  app.get("/admin/payments/pending", admin, async () => payments.pending());

  app.post("/admin/payments/:id/apply-discount", admin, async (req) => {
    const id = uuidParam(req.params, "payment");
    const { code } = parseBody(ApplyDiscountRequestSchema, req.body);
    return payments.applyDiscount(id, code);
  });

  registerAdminCrud(app, guard, {
    path: "/admin/payments",
    param: "id",
    service: payments,
    inputSchema: PaymentInputSchema,
    patchSchema: PaymentPatchSchema,
    key: (params) => uuidParam(params, "payment"),
    list: (query) => payments.search(parseQuery(SearchQuerySchema, query).search),
  });

  const customer = { preHandler: guard.role("CUSTOMER", "Only customers can access or make payments.") };

  app.post("/payments", customer, async (req, reply) => {
    const principal = requirePrincipal(req);
    const created = await payments.createOwn(principal, parseBody(CustomerPaymentInputSchema, req.body));
    reply.code(201);
    return created;
  });

  app.get("/payments", customer, async (req) => payments.listOwn(requirePrincipal(req)));

  app.get("/payments/:id", customer, async (req) => {
    return payments.getOwn(requirePrincipal(req), uuidParam(req.params, "payment"));
  });

  app.post("/payments/:id/apply-discount", customer, async (req) => {
    const principal = requirePrincipal(req);
    const id = uuidParam(req.params, "payment");
    const { code } = parseBody(ApplyDiscountRequestSchema, req.body);
    return payments.applyDiscountOwn(principal, id, code);
  });

  registerAdminCrud(app, guard, {
    path: "/admin/discount-codes",
    param: "code",
    service: discountCodes,
    inputSchema: DiscountCodeInputSchema,
    patchSchema: DiscountCodePatchSchema,
    key: (params) => keyParam(params, "code", "discount code"),
    list: (query) => discountCodes.search(parseQuery(SearchQuerySchema, query).search),
  });

  const authenticated = { preHandler: guard.authenticated };

  app.get("/discount-codes", authenticated, async () => discountCodes.valid());

  app.get("/discount-codes/valid", authenticated, async () => discountCodes.valid());

  app.get("/discount-codes/:code", authenticated, async (req) => {
    return discountCodes.getValid(keyParam(req.params, "code", "discount code"));
  });
}
