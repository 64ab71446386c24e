import type { DiscountCode, Payment } from "@lasercare/shared-schemas";
import { ValidationError } from "../http/errors.js";
import { subtractMoney } from "./money.js";

export type DiscountApplication = {
  discount: DiscountCode;
  payment: Payment;
};

export function isExhausted(code: DiscountCode): boolean {
  return code.is_used || code.usage_count >= code.max_usage;
}

export function isExpired(code: DiscountCode, now: Date): boolean {
  return code.valid_until !== null && Date.parse(code.valid_until) < now.getTime();
}

export function isValidCode(code: DiscountCode, now: Date): boolean {
  return !isExhausted(code) && !isExpired(code, now);
}

/**
 * Deducts the code's amount from the payment and consumes one use of the code.
 * Pure: the caller persists both returned rows in a single transaction.
 */
export function applyDiscount(code: DiscountCode, payment: Payment, now: Date): DiscountApplication {
  if (isExhausted(code)) {
    throw ValidationError.field("code", "Discount code is already used or exhausted");
  }
  if (isExpired(code, now)) {
    throw ValidationError.field("code", "Discount code has expired");
  }

  const amount = subtractMoney(payment.amount, code.amount);
  if (amount < 0) {
    throw ValidationError.field("amount", "Discount cannot exceed payment amount");
  }

  const usage_count = code.usage_count + 1;
  const stamp = now.toISOString();
  return {
    discount: {
      ...code,
      usage_count,
      is_used: usage_count >= code.max_usage,
      updated_at: stamp,
    },
    payment: { ...payment, amount, updated_at: stamp },
  };
}
