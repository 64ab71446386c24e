import type { UserRole } from "@lasercare/shared-schemas";

/** The authenticated caller of a request. */
export type Principal = {
  id: number;
  username: string;
  role: UserRole;
};
