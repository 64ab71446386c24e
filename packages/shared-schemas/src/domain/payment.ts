import { z } from "zod";
import { TimestampSchema, UserIdSchema, UuidSchema } from "./common.js";
import { MoneySchema } from "./money.js";

export const PaymentStatusSchema = z.enum(["PENDING", "COMPLETED", "FAILED", "REFUNDED", "CANCELLED"]);
export const PaymentTypeSchema = z.enum(["PAYPAL", "CREDIT_CARD", "BANK_TRANSFER"]);

export const PaymentSchema = z.object({
  id: UuidSchema,
  user_id: UserIdSchema,
  reservation_id: UuidSchema,
  amount: MoneySchema,
  status: PaymentStatusSchema,
  payment_type: PaymentTypeSchema,
  transaction_id: z.string().nullable(),
  payment_timestamp: TimestampSchema.nullable(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const PaymentInputSchema = z.object({
  user_id: UserIdSchema,
  reservation_id: UuidSchema,
  amount: MoneySchema,
  status: PaymentStatusSchema.optional(),
  payment_type: PaymentTypeSchema.optional(),
  transaction_id: z.string().max(100).nullable().optional(),
  payment_timestamp: TimestampSchema.nullable().optional(),
});

export const PaymentPatchSchema = PaymentInputSchema.partial();

export const CustomerPaymentInputSchema = PaymentInputSchema.omit({ user_id: true });

export const ApplyDiscountRequestSchema = z.object({
  code: z.string().min(1),
});

export const DiscountCodeSchema = z.object({
  code: z.string(),
  amount: MoneySchema,
  is_used: z.boolean(),
  valid_until: TimestampSchema.nullable(),
  max_usage: z.number().int(),
  usage_count: z.number().int(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

// usage_count is only ever moved by applying the code.
export const DiscountCodeInputSchema = z.object({
  code: z.string().max(10, "Discount code cannot exceed 10 characters"),
  amount: MoneySchema,
  is_used: z.boolean().optional(),
  valid_until: TimestampSchema.nullable().optional(),
  max_usage: z.number().int().optional(),
});

export const DiscountCodePatchSchema = DiscountCodeInputSchema.partial();

export type PaymentStatus = z.infer<typeof PaymentStatusSchema>;
export type PaymentType = z.infer<typeof PaymentTypeSchema>;
export type Payment = z.infer<typeof PaymentSchema>;
export type PaymentInput = z.infer<typeof PaymentInputSchema>;
export type PaymentPatch = z.infer<typeof PaymentPatchSchema>;
export type DiscountCode = z.infer<typeof DiscountCodeSchema>;
export type DiscountCodeInput = z.infer<typeof DiscountCodeInputSchema>;
export type DiscountCodePatch = z.infer<typeof DiscountCodePatchSchema>;
