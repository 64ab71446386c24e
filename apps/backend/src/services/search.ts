import type { UserStore } from "./identity/userStore.js";

/** Case-insensitive substring match of `term` against any of the values; no term matches all. */
export function matchesSearch(term: string | undefined, values: Array<string | null | undefined>): boolean {
  const needle = term?.trim().toLowerCase();
  if (!needle) return true;
  return values.some((v) => typeof v === "string" && v.toLowerCase().includes(needle));
}

export async function usernamesById(users: UserStore): Promise<Map<number, string>> {
  const all = await users.list();
  return new Map(all.map((u) => [u.id, u.username]));
}
