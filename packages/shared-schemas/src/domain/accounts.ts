import { z } from "zod";
import { UsernameSchema } from "./user.js";

export const SignupRequestSchema = z.object({
  username: UsernameSchema,
  password: z.string().min(8),
  email: z.union([z.string().email(), z.literal("")]).optional(),
  first_name: z.string().max(150).optional(),
  last_name: z.string().max(150).optional(),
});

export const LoginRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const ForgotPasswordRequestSchema = z.object({
  email: z.string().email(),
});

export const ResetPasswordRequestSchema = z.object({
  token: z.string().min(1),
  password: z.string().min(8),
});

export const TokenRefreshRequestSchema = z.object({
  refresh: z.string().min(1),
});

export const TokenPairSchema = z.object({
  refresh: z.string(),
  access: z.string(),
});

export type SignupRequest = z.infer<typeof SignupRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type TokenPair = z.infer<typeof TokenPairSchema>;
