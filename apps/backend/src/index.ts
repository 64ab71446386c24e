import dotenv from "dotenv";
import { loadEnv } from "./config/env.js";
import { createHttpServer } from "./http/server.js";

dotenv.config();

createHttpServer(loadEnv(process.env)).catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
