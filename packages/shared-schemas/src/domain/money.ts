import { z } from "zod";

// Two-decimal amounts (prices, payments, discounts). Sign is checked by the
// entity rules so the failing field can be named.
export const MoneySchema = z.number().finite();

export type Money = z.infer<typeof MoneySchema>;
