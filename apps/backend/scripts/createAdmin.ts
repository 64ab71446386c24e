import dotenv from "dotenv";
import { z } from "zod";
import { UsernameSchema } from "@lasercare/shared-schemas";
import { loadEnv } from "../src/config/env.js";
import { createPool } from "../src/db/pool.js";
import { createLogger } from "../src/observability/logger.js";
import { UserService } from "../src/services/identity/userService.js";
import { PgUserStore } from "../src/services/identity/userStore.js";

dotenv.config();

// Usage: npm run create-admin -- <username> <password> [email]
const ArgsSchema = z.tuple([UsernameSchema, z.string().min(8), z.string().email().optional()]);

async function main() {
  const [username, password, email] = ArgsSchema.parse(process.argv.slice(2));
  const env = loadEnv(process.env);
  const log = createLogger(env.LOG_LEVEL);
  const pool = createPool(env);
  try {
    const users = new UserService(new PgUserStore(pool), { log, clock: () => new Date() });
    const admin = await users.create({ username, password, email, role: "ADMIN" });
    console.log(`Created admin user ${admin.username} (id ${admin.id})`);
  } catch (err) {
    console.error(err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void main();
