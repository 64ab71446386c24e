import { readFile } from "node:fs/promises";
import dotenv from "dotenv";
import { loadEnv } from "../src/config/env.js";
import { createPool } from "../src/db/pool.js";
import { withTransaction } from "../src/db/tx.js";

dotenv.config();

const schemaUrl = new URL("../db/schema.sql", import.meta.url);

async function main() {
  const env = loadEnv(process.env);
  const pool = createPool(env);
  try {
    const sql = await readFile(schemaUrl, "utf8");
    await withTransaction(pool, async (client) => {
      await client.query(sql);
    });
    console.log(`Applied ${schemaUrl.pathname}`);
  } catch (err) {
    console.error(err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void main();
