import type pg from "pg";
import {
  DiscountCodeSchema,
  PaymentSchema,
  type DiscountCode,
  type Payment,
} from "@lasercare/shared-schemas";
import { withTransaction } from "../../db/tx.js";
import { toEntity, type Row } from "../../db/table.js";
import { applyDiscount, type DiscountApplication } from "../../domain/discount.js";
import { ValidationError } from "../../http/errors.js";
import type { MemoryTable } from "../memory/memoryDatabase.js";

export const PAYMENT_COLUMNS = [
  "id",
  "user_id",
  "reservation_id",
  "amount",
  "status",
  "payment_type",
  "transaction_id",
  "payment_timestamp",
  "created_at",
  "updated_at",
] as const;

export const DISCOUNT_CODE_COLUMNS = [
  "code",
  "amount",
  "is_used",
  "valid_until",
  "max_usage",
  "usage_count",
  "created_at",
  "updated_at",
] as const;

/** Applies a discount code to a payment as one atomic two-row update. */
export interface DiscountLedger {
  /** Resolves to null when the payment does not exist. */
  apply(paymentId: string, code: string, now: Date): Promise<DiscountApplication | null>;
}

function unknownCode(): ValidationError {
  return ValidationError.field("code", "Discount code does not exist.");
}

export class PgDiscountLedger implements DiscountLedger {
  constructor(private readonly pool: pg.Pool) {}

  async apply(paymentId: string, code: string, now: Date): Promise<DiscountApplication | null> {
    return withTransaction(this.pool, async (client) => {
      const paymentRow = await client
        .query<Row>(`SELECT * FROM payments WHERE id = $1 FOR UPDATE`, [paymentId])
        .then((r) => r.rows[0]);
      if (!paymentRow) return null;

      const codeRow = await client
        .query<Row>(`SELECT * FROM discount_codes WHERE code = $1 FOR UPDATE`, [code])
        .then((r) => r.rows[0]);
      if (!codeRow) throw unknownCode();

      const result = applyDiscount(
        toEntity(DiscountCodeSchema, codeRow),
        toEntity(PaymentSchema, paymentRow),
        now
      );

      await client.query(
        `UPDATE discount_codes
         SET usage_count = $1, is_used = $2, updated_at = $3
         WHERE code = $4`,
        [result.discount.usage_count, result.discount.is_used, result.discount.updated_at, code]
      );
      await client.query(
        `UPDATE payments SET amount = $1, updated_at = $2 WHERE id = $3`,
        [result.payment.amount, result.payment.updated_at, paymentId]
      );
      return result;
    });
  }
}

// Reads and writes both rows without yielding, so no other request can interleave.
export class MemoryDiscountLedger implements DiscountLedger {
  constructor(
    private readonly payments: MemoryTable<Payment, "id">,
    private readonly codes: MemoryTable<DiscountCode, "code">
  ) {}

  async apply(paymentId: string, code: string, now: Date): Promise<DiscountApplication | null> {
    const payment = this.payments.peek(paymentId);
    if (!payment) return null;
    const discount = this.codes.peek(code);
    if (!discount) throw unknownCode();

    const result = applyDiscount(discount, payment, now);
    this.codes.put(result.discount);
    this.payments.put(result.payment);
    return result;
  }
}
