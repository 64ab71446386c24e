import { z } from "zod";
import { DateSchema, TimestampSchema, UserIdSchema, UuidSchema } from "./common.js";

export const StaffAttendanceSchema = z.object({
  id: UuidSchema,
  user_id: UserIdSchema,
  entry_timestamp: TimestampSchema.nullable(),
  exit_timestamp: TimestampSchema.nullable(),
  has_exited: z.boolean(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const StaffAttendanceInputSchema = z.object({
  user_id: UserIdSchema,
  entry_timestamp: TimestampSchema.nullable().optional(),
  exit_timestamp: TimestampSchema.nullable().optional(),
  has_exited: z.boolean().optional(),
});

export const StaffAttendancePatchSchema = StaffAttendanceInputSchema.partial();

export const CustomerProfileSchema = z.object({
  id: UuidSchema,
  user_id: UserIdSchema,
  national_id: z.string(),
  address: z.string(),
  house_number: z.string(),
  has_medical_history: z.boolean(),
  has_drug_history: z.boolean(),
  primary_physician: z.string(),
  is_premium: z.boolean(),
  offline_appointments: z.number().int(),
  last_visit_date: DateSchema.nullable(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const CustomerProfileInputSchema = z.object({
  user_id: UserIdSchema,
  national_id: z.string().max(15, "National ID cannot exceed 15 characters"),
  address: z.string(),
  house_number: z.string().max(15),
  has_medical_history: z.boolean().optional(),
  has_drug_history: z.boolean().optional(),
  primary_physician: z.string().max(50).optional(),
  is_premium: z.boolean().optional(),
  offline_appointments: z.number().int().optional(),
  last_visit_date: DateSchema.nullable().optional(),
});

export const CustomerProfilePatchSchema = CustomerProfileInputSchema.partial();

// Customers edit their own profile but never re-point it at another user.
export const OwnCustomerProfilePatchSchema = CustomerProfilePatchSchema.omit({ user_id: true });

export type StaffAttendance = z.infer<typeof StaffAttendanceSchema>;
export type StaffAttendanceInput = z.infer<typeof StaffAttendanceInputSchema>;
export type StaffAttendancePatch = z.infer<typeof StaffAttendancePatchSchema>;
export type CustomerProfile = z.infer<typeof CustomerProfileSchema>;
export type CustomerProfileInput = z.infer<typeof CustomerProfileInputSchema>;
export type CustomerProfilePatch = z.infer<typeof CustomerProfilePatchSchema>;
