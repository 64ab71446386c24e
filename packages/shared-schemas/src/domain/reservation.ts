import { z } from "zod";
import { DateSchema, TimestampSchema, UserIdSchema, UuidSchema } from "./common.js";
import { MoneySchema } from "./money.js";

export const ReservationTypeSchema = z.enum(["STANDARD", "PREMIUM"]);

export const ReservationSchema = z.object({
  id: UuidSchema,
  user_id: UserIdSchema,
  slot_id: UuidSchema,
  treatment_area: z.string().nullable(),
  area_schedule_ids: z.array(UuidSchema),
  session_number: z.number().int(),
  reservation_type: ReservationTypeSchema,
  is_online: z.boolean(),
  is_charged: z.boolean(),
  is_paid: z.boolean(),
  used_discount_code: z.boolean(),
  total_price: MoneySchema,
  final_amount: MoneySchema,
  discount_code: z.string().nullable(),
  reservation_timestamp: TimestampSchema.nullable(),
  request_timestamp: TimestampSchema.nullable(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const ReservationInputSchema = z.object({
  user_id: UserIdSchema,
  slot_id: UuidSchema,
  treatment_area: z.string().nullable().optional(),
  area_schedule_ids: z.array(UuidSchema).optional(),
  session_number: z.number().int(),
  reservation_type: ReservationTypeSchema.optional(),
  is_online: z.boolean().optional(),
  is_charged: z.boolean().optional(),
  is_paid: z.boolean().optional(),
  used_discount_code: z.boolean().optional(),
  total_price: MoneySchema,
  final_amount: MoneySchema,
  discount_code: z.string().nullable().optional(),
  reservation_timestamp: TimestampSchema.nullable().optional(),
  request_timestamp: TimestampSchema.nullable().optional(),
});

export const ReservationPatchSchema = ReservationInputSchema.partial();

// The owner comes from the bearer token on customer routes.
export const CustomerReservationInputSchema = ReservationInputSchema.omit({ user_id: true });

export const PreReservationSchema = z.object({
  id: UuidSchema,
  user_id: UserIdSchema,
  area_schedule_id: UuidSchema,
  session_count: z.number().int(),
  last_session_date: DateSchema,
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const PreReservationInputSchema = z.object({
  user_id: UserIdSchema,
  area_schedule_id: UuidSchema,
  session_count: z.number().int(),
  last_session_date: DateSchema,
});

export const PreReservationPatchSchema = PreReservationInputSchema.partial();

export type ReservationType = z.infer<typeof ReservationTypeSchema>;
export type Reservation = z.infer<typeof ReservationSchema>;
export type ReservationInput = z.infer<typeof ReservationInputSchema>;
export type ReservationPatch = z.infer<typeof ReservationPatchSchema>;
export type PreReservation = z.infer<typeof PreReservationSchema>;
export type PreReservationInput = z.infer<typeof PreReservationInputSchema>;
export type PreReservationPatch = z.infer<typeof PreReservationPatchSchema>;
