import { pbkdf2, randomBytes, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";

const pbkdf2Async = promisify(pbkdf2);

export const PBKDF2_ITERATIONS = 210_000;
const ALGORITHM = "pbkdf2_sha256";
const KEY_LENGTH = 32;

// Marks accounts created without a password; never matches any input.
export const UNUSABLE_PASSWORD = "!";

async function derive(password: string, salt: string, iterations: number): Promise<Buffer> {
  return pbkdf2Async(password, salt, iterations, KEY_LENGTH, "sha256");
}

/** Returns `pbkdf2_sha256$<iterations>$<salt>$<hash>` with base64 salt and hash. */
export async function hashPassword(password: string, iterations = PBKDF2_ITERATIONS): Promise<string> {
  const salt = randomBytes(16).toString("base64");
  const hash = await derive(password, salt, iterations);
  return `${ALGORITHM}$${iterations}$${salt}$${hash.toString("base64")}`;
}

export async function verifyPassword(password: string, encoded: string): Promise<boolean> {
  const [algorithm, rounds, salt, expected] = encoded.split("$");
  const iterations = Number(rounds);
  if (algorithm !== ALGORITHM || !salt || !expected || !Number.isInteger(iterations) || iterations <= 0) {
    return false;
  }
  const actual = await derive(password, salt, iterations);
  const stored = Buffer.from(expected, "base64");
  return stored.length === actual.length && timingSafeEqual(stored, actual);
}
