import { z } from "zod";
import { UuidSchema } from "@lasercare/shared-schemas";
import { notFound } from "../services/entityService.js";
import { ValidationError } from "./errors.js";

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  return parsed.data;
}

export const parseQuery = parseBody;

export const SearchQuerySchema = z.object({
  search: z.string().optional(),
});

const ParamsSchema = z.record(z.string());

function param(params: unknown, name: string): string | undefined {
  const parsed = ParamsSchema.safeParse(params);
  return parsed.success ? parsed.data[name] : undefined;
}

// Malformed keys can never match a row, so they answer 404 like a missing one.
export function uuidParam(params: unknown, entity: string): string {
  const id = param(params, "id");
  if (!id || !UuidSchema.safeParse(id).success) throw notFound(entity);
  return id;
}

// users.id is a Postgres SERIAL (INTEGER).
const MAX_USER_ID = 2147483647;

export function userIdParam(params: unknown): number {
  const id = param(params, "id");
  if (!id || !/^\d+$/.test(id)) throw notFound("user");
  const value = Number(id);
  if (value > MAX_USER_ID) throw notFound("user");
  return value;
}

export function keyParam(params: unknown, name: string, entity: string): string {
  const key = param(params, name);
  if (!key) throw notFound(entity);
  return key;
}
