import { z } from "zod";

const BooleanFlag = z
  .string()
  .optional()
  .transform((v) => v === "true");

const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  BACKEND_PORT: z.coerce.number().int().positive().default(8081),
  STORE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
  DB_CONNECTION_STRING: z.string().optional(),
  DB_SSL: BooleanFlag,
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  JWT_SECRET: z.string().min(1).default("dev_jwt_secret"),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(86_400),
  LOG_LEVEL: z.string().default("info"),
});

export type Env = z.infer<typeof EnvSchema> & {
  db_connection_string: string;
};

export function loadEnv(processEnv: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.parse(processEnv);
  const db_connection_string =
    parsed.DB_CONNECTION_STRING || "postgres://localhost:5432/postgres";
  return { ...parsed, db_connection_string };
}
