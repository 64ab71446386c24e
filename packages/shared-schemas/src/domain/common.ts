import { z } from "zod";

export const DateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine(
    (s) => {
      const d = new Date(`${s}T00:00:00Z`);
      return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(s);
    },
    { message: "Invalid calendar date." }
  );

export const TimestampSchema = z.string().datetime({ offset: true });
export const UuidSchema = z.string().uuid();
export const UserIdSchema = z.number().int().positive();

export type IsoDate = z.infer<typeof DateSchema>;
export type Timestamp = z.infer<typeof TimestampSchema>;
