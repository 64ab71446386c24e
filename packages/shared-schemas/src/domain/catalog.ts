import { z } from "zod";
import { TimestampSchema, UuidSchema } from "./common.js";
import { MoneySchema } from "./money.js";

export const TreatmentAreaSchema = z.object({
  name: z.string(),
  current_price: MoneySchema,
  deadline_reset: z.number().int(),
  is_active: z.boolean(),
  operate_time: z.number().int(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const TreatmentAreaInputSchema = z.object({
  name: z.string().max(50, "Area name cannot exceed 50 characters"),
  current_price: MoneySchema.optional(),
  deadline_reset: z.number().int().optional(),
  is_active: z.boolean().optional(),
  operate_time: z.number().int().optional(),
});

export const TreatmentAreaPatchSchema = TreatmentAreaInputSchema.partial();

export const AreaScheduleSchema = z.object({
  id: UuidSchema,
  treatment_area: z.string(),
  price: MoneySchema,
  start_time: TimestampSchema.nullable(),
  end_time: TimestampSchema.nullable(),
  operate_time: z.number().int(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const AreaScheduleInputSchema = z.object({
  treatment_area: z.string().min(1),
  price: MoneySchema.optional(),
  start_time: TimestampSchema.nullable().optional(),
  end_time: TimestampSchema.nullable().optional(),
  operate_time: z.number().int().optional(),
});

export const AreaSchedulePatchSchema = AreaScheduleInputSchema.partial();

export type TreatmentArea = z.infer<typeof TreatmentAreaSchema>;
export type TreatmentAreaInput = z.infer<typeof TreatmentAreaInputSchema>;
export type TreatmentAreaPatch = z.infer<typeof TreatmentAreaPatchSchema>;
export type AreaSchedule = z.infer<typeof AreaScheduleSchema>;
export type AreaScheduleInput = z.infer<typeof AreaScheduleInputSchema>;
export type AreaSchedulePatch = z.infer<typeof AreaSchedulePatchSchema>;
