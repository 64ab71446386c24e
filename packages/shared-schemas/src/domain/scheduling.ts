import { z } from "zod";
import { DateSchema, TimestampSchema, UserIdSchema, UuidSchema } from "./common.js";

export const DayPeriodSchema = z.enum(["MORNING", "AFTERNOON"]);

export const TimeSlotSchema = z.enum([
  "8-10",
  "10-12",
  "12-14",
  "15-17",
  "17-19",
  "19-21",
  "21-23",
  "23-1",
  "1-3",
  "3-5",
]);

export const OperatorShiftSchema = z.object({
  id: UuidSchema,
  operator_id: UserIdSchema,
  operator_name: z.string(),
  shift_date: DateSchema,
  period: DayPeriodSchema,
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const OperatorShiftInputSchema = z.object({
  operator_id: UserIdSchema,
  operator_name: z.string().max(50, "Operator name cannot exceed 50 characters").optional(),
  shift_date: DateSchema,
  period: DayPeriodSchema.optional(),
});

export const OperatorShiftPatchSchema = OperatorShiftInputSchema.partial();

export const ReservationSlotSchema = z.object({
  id: UuidSchema,
  operator_id: UserIdSchema,
  date: DateSchema,
  period: DayPeriodSchema,
  time_slot: TimeSlotSchema,
  duration: z.number().int(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const ReservationSlotInputSchema = z.object({
  operator_id: UserIdSchema,
  date: DateSchema,
  period: DayPeriodSchema,
  time_slot: TimeSlotSchema,
  duration: z.number().int().optional(),
});

export const ReservationSlotPatchSchema = ReservationSlotInputSchema.partial();

export const CancellationPeriodSchema = z.object({
  id: UuidSchema,
  start_time: TimestampSchema,
  end_time: TimestampSchema,
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const CancellationPeriodInputSchema = z.object({
  start_time: TimestampSchema,
  end_time: TimestampSchema,
});

export const CancellationPeriodPatchSchema = CancellationPeriodInputSchema.partial();

export const DateQuerySchema = z.object({
  date: DateSchema,
});

export type DayPeriod = z.infer<typeof DayPeriodSchema>;
export type TimeSlot = z.infer<typeof TimeSlotSchema>;
export type OperatorShift = z.infer<typeof OperatorShiftSchema>;
export type OperatorShiftInput = z.infer<typeof OperatorShiftInputSchema>;
export type OperatorShiftPatch = z.infer<typeof OperatorShiftPatchSchema>;
export type ReservationSlot = z.infer<typeof ReservationSlotSchema>;
export type ReservationSlotInput = z.infer<typeof ReservationSlotInputSchema>;
export type ReservationSlotPatch = z.infer<typeof ReservationSlotPatchSchema>;
export type CancellationPeriod = z.infer<typeof CancellationPeriodSchema>;
export type CancellationPeriodInput = z.infer<typeof CancellationPeriodInputSchema>;
export type CancellationPeriodPatch = z.infer<typeof CancellationPeriodPatchSchema>;
