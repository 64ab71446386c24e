import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createActor, createTestContext, type Actor, type TestContext } from "../helpers.js";

describe("payment routes", () => {
  let ctx: TestContext;
  let admin: Actor;
  let customer: Actor;
  let otherCustomer: Actor;
  let reservationId: string;
  let otherReservationId: string;

  beforeEach(async () => {
    ctx = await createTestContext();
    admin = await createActor(ctx, "root", "ADMIN");
    const operator = await createActor(ctx, "oscar", "STAFF");
    customer = await createActor(ctx, "carol", "CUSTOMER");
    otherCustomer = await createActor(ctx, "cody", "CUSTOMER");
    const slot = await ctx.services.slots.create({
      operator_id: operator.user.id,
      date: "2025-03-12",
      period: "MORNING",
      time_slot: "8-10",
    });
    const booking = { slot_id: slot.id, session_number: 1, total_price: 100, final_amount: 100 };
    reservationId = (await ctx.services.reservations.createOwn(customer.user, booking)).id;
    otherReservationId = (await ctx.services.reservations.createOwn(otherCustomer.user, booking)).id;
    await ctx.services.discountCodes.create({ code: "ONCE", amount: 30, max_usage: 1 });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  function pay(actor: Actor, payload: Record<string, unknown> = {}) {
    return ctx.app.inject({
      method: "POST",
      url: "/api/v1/payments",
      headers: actor.headers,
      payload: { reservation_id: reservationId, amount: 100, payment_type: "CREDIT_CARD", ...payload },
    });
  }

  function applyCode(actor: Actor, paymentId: string, code: string, scope = "") {
    return ctx.app.inject({
      method: "POST",
      url: `/api/v1${scope}/payments/${paymentId}/apply-discount`,
      headers: actor.headers,
      payload: { code },
    });
  }

  it("records a pending payment for the caller", async () => {
    const res = await pay(customer);
    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({
      user_id: customer.user.id,
      reservation_id: reservationId,
      amount: 100,
      status: "PENDING",
      payment_type: "CREDIT_CARD",
      transaction_id: null,
    });
  });

  it("requires a transaction id for PayPal payments", async () => {
    const res = await pay(customer, { payment_type: "PAYPAL" });
    expect(res.statusCode).toBe(400);
    expect(res.json().details.fieldErrors).toEqual({
      transaction_id: ["Transaction id is required for PayPal payments"],
    });
  });

  it("refuses paying for someone else's reservation", async () => {
    const res = await pay(customer, { reservation_id: otherReservationId });
    expect(res.statusCode).toBe(400);
    expect(res.json().details.fieldErrors).toEqual({
      reservation_id: ["Reservation does not belong to the current user."],
    });
  });

  it("rejects a reused transaction id", async () => {
    await pay(customer, { payment_type: "PAYPAL", transaction_id: "TX-100" });
    const res = await pay(customer, { payment_type: "PAYPAL", transaction_id: "TX-100" });
    expect(res.statusCode).toBe(400);
    expect(res.json().details.fieldErrors).toEqual({
      transaction_id: ["A payment with this transaction id already exists."],
    });
  });

  it("hides other customers' payments", async () => {
    const payment = (await pay(customer)).json();
    const res = await ctx.app.inject({
      method: "GET",
      url: `/api/v1/payments/${payment.id}`,
      headers: otherCustomer.headers,
    });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Payment not found" });
  });

  it("applies a single-use code exactly once", async () => {
    const payment = (await pay(customer)).json();

    const first = await applyCode(customer, payment.id, "ONCE");
    expect(first.statusCode).toBe(200);
    expect(first.json().amount).toBe(70);

    const code = await ctx.stores.discountCodes.get("ONCE");
    expect(code?.usage_count).toBe(1);
    expect(code?.is_used).toBe(true);

    const second = await applyCode(customer, payment.id, "ONCE");
    expect(second.statusCode).toBe(400);
    expect(second.json().details.fieldErrors).toEqual({
      code: ["Discount code is already used or exhausted"],
    });
    expect((await ctx.stores.payments.get(payment.id))?.amount).toBe(70);
  });

  it("rejects a discount larger than the payment without consuming the code", async () => {
    const payment = (await pay(customer, { amount: 20 })).json();
    const res = await applyCode(customer, payment.id, "ONCE");
    expect(res.statusCode).toBe(400);
    expect(res.json().details.fieldErrors).toEqual({
      amount: ["Discount cannot exceed payment amount"],
    });
    expect((await ctx.stores.discountCodes.get("ONCE"))?.usage_count).toBe(0);
  });

  it("reports an unknown code and an unknown payment", async () => {
    const payment = (await pay(customer)).json();
    const unknownCode = await applyCode(admin, payment.id, "NOPE", "/admin");
    expect(unknownCode.statusCode).toBe(400);
    expect(unknownCode.json().details.fieldErrors).toEqual({ code: ["Discount code does not exist."] });

    const unknownPayment = await applyCode(admin, "99999999-9999-4999-8999-999999999999", "ONCE", "/admin");
    expect(unknownPayment.statusCode).toBe(404);
  });

  it("does not let a customer discount another customer's payment", async () => {
    const payment = (await pay(customer)).json();
    const res = await applyCode(otherCustomer, payment.id, "ONCE");
    expect(res.statusCode).toBe(404);
    expect((await ctx.stores.discountCodes.get("ONCE"))?.usage_count).toBe(0);
  });

  it("lists pending payments for admins", async () => {
    const payment = (await pay(customer)).json();
    await pay(customer);
    await ctx.app.inject({
      method: "PATCH",
      url: `/api/v1/admin/payments/${payment.id}`,
      headers: admin.headers,
      payload: { status: "COMPLETED" },
    });
    const res = await ctx.app.inject({ method: "GET", url: "/api/v1/admin/payments/pending", headers: admin.headers });
    expect(res.json()).toHaveLength(1);
    expect(res.json()[0].id).not.toBe(payment.id);
  });

  describe("discount codes", () => {
    it("ignores usage_count on create", async () => {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/admin/discount-codes",
        headers: admin.headers,
        payload: { code: "MANY", amount: 5, max_usage: 3, usage_count: 2 },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({ code: "MANY", usage_count: 0, is_used: false, valid_until: null });
    });

    it("rejects an expired validity date", async () => {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/admin/discount-codes",
        headers: admin.headers,
        payload: { code: "OLD", amount: 5, valid_until: "2025-01-01T00:00:00Z" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().details.fieldErrors).toEqual({
        valid_until: ["Discount code cannot have an expired validity date"],
      });
    });

    it("shows only valid codes to customers", async () => {
      await ctx.services.discountCodes.create({ code: "USED", amount: 5, is_used: true });

      const valid = await ctx.app.inject({
        method: "GET",
        url: "/api/v1/discount-codes/valid",
        headers: customer.headers,
      });
      expect(valid.json().map((c: { code: string }) => c.code)).toEqual(["ONCE"]);

      const used = await ctx.app.inject({
        method: "GET",
        url: "/api/v1/discount-codes/USED",
        headers: customer.headers,
      });
      expect(used.statusCode).toBe(404);
      expect(used.json()).toEqual({ error: "Discount code not found" });
    });

    it("marks a code used once its usage limit is lowered to the current count", async () => {
      await ctx.services.discountCodes.create({ code: "TWO", amount: 5, max_usage: 2 });
      const payment = await pay(customer);
      expect((await applyCode(customer, payment.json().id, "TWO")).statusCode).toBe(200);

      const lowered = await ctx.app.inject({
        method: "PATCH",
        url: "/api/v1/admin/discount-codes/TWO",
        headers: admin.headers,
        payload: { max_usage: 1 },
      });
      expect(lowered.statusCode).toBe(200);
      expect(lowered.json()).toMatchObject({ max_usage: 1, usage_count: 1, is_used: true });

      const reopened = await ctx.app.inject({
        method: "PATCH",
        url: "/api/v1/admin/discount-codes/TWO",
        headers: admin.headers,
        payload: { is_used: false },
      });
      expect(reopened.json()).toMatchObject({ usage_count: 1, is_used: true });

      const valid = await ctx.app.inject({
        method: "GET",
        url: "/api/v1/discount-codes/valid",
        headers: customer.headers,
      });
      expect(valid.json().map((c: { code: string }) => c.code)).toEqual(["ONCE"]);
    });

    it("clears the code from reservations when it is deleted from the store", async () => {
      await ctx.services.reservations.update(reservationId, { used_discount_code: true, discount_code: "ONCE" });
      await ctx.stores.discountCodes.delete("ONCE");
      expect((await ctx.stores.reservations.get(reservationId))?.discount_code).toBeNull();
    });
  });
});
