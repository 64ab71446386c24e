import { z } from "zod";
import { TimestampSchema, UserIdSchema } from "./common.js";

export const UserRoleSchema = z.enum(["ADMIN", "CUSTOMER", "STAFF"]);

export const UsernameSchema = z
  .string()
  .trim()
  .min(1, "Username cannot be empty")
  .max(150)
  .regex(/^[\w.@+-]+$/, "Letters, digits and @/./+/-/_ only");

export const UserSchema = z.object({
  id: UserIdSchema,
  username: z.string(),
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  role: UserRoleSchema,
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const UserInputSchema = z.object({
  username: UsernameSchema,
  email: z.union([z.string().email(), z.literal("")]).optional(),
  first_name: z.string().max(150).optional(),
  last_name: z.string().max(150).optional(),
  role: UserRoleSchema.optional(),
  password: z.string().min(8).optional(),
});

export const UserPatchSchema = UserInputSchema.partial();

// Self-service updates cannot change the role.
export const ProfilePatchSchema = UserPatchSchema.omit({ role: true });

export type UserRole = z.infer<typeof UserRoleSchema>;
export type User = z.infer<typeof UserSchema>;
export type UserInput = z.infer<typeof UserInputSchema>;
export type UserPatch = z.infer<typeof UserPatchSchema>;
export type ProfilePatch = z.infer<typeof ProfilePatchSchema>;
