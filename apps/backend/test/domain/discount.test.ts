import { describe, expect, it } from "vitest";
import type { DiscountCode, Payment } from "@lasercare/shared-schemas";
import { applyDiscount, isValidCode } from "../../src/domain/discount.js";
import { ValidationError } from "../../src/http/errors.js";

const now = new Date("2025-03-10T09:00:00.000Z");

function code(overrides: Partial<DiscountCode> = {}): DiscountCode {
  return {
    code: "SPRING",
    amount: 20,
    is_used: false,
    valid_until: null,
    max_usage: 2,
    usage_count: 0,
    created_at: "2025-01-01T00:00:00.000Z",
    updated_at: "2025-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function payment(overrides: Partial<Payment> = {}): Payment {
  return {
    id: "9b2f3c1e-4a5d-4e6f-8a7b-1c2d3e4f5a6b",
    user_id: 1,
    reservation_id: "0e1d2c3b-4a59-4687-9a8b-7c6d5e4f3a2b",
    amount: 100,
    status: "PENDING",
    payment_type: "CREDIT_CARD",
    transaction_id: null,
    payment_timestamp: null,
    created_at: "2025-01-01T00:00:00.000Z",
    updated_at: "2025-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function fieldErrors(fn: () => unknown): Record<string, string[]> {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.details.fieldErrors;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("applyDiscount", () => {
  it("deducts the amount and consumes one use", () => {
    const result = applyDiscount(code(), payment(), now);
    expect(result.payment.amount).toBe(80);
    expect(result.payment.updated_at).toBe("2025-03-10T09:00:00.000Z");
    expect(result.discount.usage_count).toBe(1);
    expect(result.discount.is_used).toBe(false);
  });

  it("marks the code used once the last use is consumed", () => {
    const result = applyDiscount(code({ usage_count: 1 }), payment(), now);
    expect(result.discount.usage_count).toBe(2);
    expect(result.discount.is_used).toBe(true);
  });

  it("subtracts in cents", () => {
    const result = applyDiscount(code({ amount: 0.1 }), payment({ amount: 0.3 }), now);
    expect(result.payment.amount).toBe(0.2);
  });

  it("allows a discount equal to the payment", () => {
    expect(applyDiscount(code({ amount: 100 }), payment(), now).payment.amount).toBe(0);
  });

  it("rejects an exhausted code", () => {
    expect(fieldErrors(() => applyDiscount(code({ usage_count: 2 }), payment(), now))).toEqual({
      code: ["Discount code is already used or exhausted"],
    });
    expect(fieldErrors(() => applyDiscount(code({ is_used: true }), payment(), now))).toEqual({
      code: ["Discount code is already used or exhausted"],
    });
  });

  it("rejects an expired code", () => {
    const expired = code({ valid_until: "2025-03-01T00:00:00.000Z" });
    expect(fieldErrors(() => applyDiscount(expired, payment(), now))).toEqual({
      code: ["Discount code has expired"],
    });
  });

  it("rejects a discount larger than the payment", () => {
    expect(fieldErrors(() => applyDiscount(code({ amount: 150 }), payment(), now))).toEqual({
      amount: ["Discount cannot exceed payment amount"],
    });
  });

  it("leaves its inputs untouched", () => {
    const before = code();
    const paid = payment();
    applyDiscount(before, paid, now);
    expect(before.usage_count).toBe(0);
    expect(paid.amount).toBe(100);
  });
});

describe("isValidCode", () => {
  it("treats codes without an expiry as valid", () => {
    expect(isValidCode(code(), now)).toBe(true);
  });

  it("rejects used and expired codes", () => {
    expect(isValidCode(code({ is_used: true }), now)).toBe(false);
    expect(isValidCode(code({ valid_until: "2025-03-09T00:00:00.000Z" }), now)).toBe(false);
    expect(isValidCode(code({ valid_until: "2025-03-11T00:00:00.000Z" }), now)).toBe(true);
  });

  it("rejects a code whose usage reached the limit", () => {
    expect(isValidCode(code({ max_usage: 2, usage_count: 2, is_used: false }), now)).toBe(false);
  });
});
