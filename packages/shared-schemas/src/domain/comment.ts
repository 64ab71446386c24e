import { z } from "zod";
import { TimestampSchema, UserIdSchema, UuidSchema } from "./common.js";

export const CommentSchema = z.object({
  id: UuidSchema,
  user_id: UserIdSchema,
  message: z.string(),
  is_reviewed: z.boolean(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const CommentInputSchema = z.object({
  user_id: UserIdSchema,
  message: z.string(),
  is_reviewed: z.boolean().optional(),
});

export const CommentPatchSchema = CommentInputSchema.partial();

export const CustomerCommentInputSchema = z.object({
  message: z.string(),
});

export type Comment = z.infer<typeof CommentSchema>;
export type CommentInput = z.infer<typeof CommentInputSchema>;
export type CommentPatch = z.infer<typeof CommentPatchSchema>;
