import { randomUUID } from "node:crypto";
import type {
  CustomerProfile,
  CustomerProfileInput,
  CustomerProfilePatch,
} from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import { checkCustomerProfile } from "../../domain/rules.js";
import type { Principal } from "../auth/principal.js";
import { EntityService, notFound, type ServiceContext } from "../entityService.js";
import { matchesSearch, usernamesById } from "../search.js";
import type { UserStore } from "./userStore.js";

const ENTITY = "customer profile";

export class CustomerProfileService extends EntityService<
  CustomerProfile,
  "id",
  CustomerProfileInput,
  CustomerProfilePatch
> {
  constructor(
    table: Table<CustomerProfile, "id">,
    private readonly users: UserStore,
    ctx: ServiceContext
  ) {
    super(
      table,
      {
        entity: ENTITY,
        build: (input, now) => ({
          id: randomUUID(),
          user_id: input.user_id,
          national_id: input.national_id,
          address: input.address,
          house_number: input.house_number,
          has_medical_history: input.has_medical_history ?? false,
          has_drug_history: input.has_drug_history ?? false,
          primary_physician: input.primary_physician ?? "",
          is_premium: input.is_premium ?? false,
          offline_appointments: input.offline_appointments ?? 0,
          last_visit_date: input.last_visit_date ?? null,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({ ...existing, ...patch }),
        check: (row) => checkCustomerProfile(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<CustomerProfile[]> {
    const [rows, names] = await Promise.all([this.list(), usernamesById(this.users)]);
    return rows.filter((r) => matchesSearch(term, [r.national_id, names.get(r.user_id)]));
  }

  listOwn(principal: Principal): Promise<CustomerProfile[]> {
    return this.list({ user_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<CustomerProfile> {
    const row = await this.find(id);
    if (!row || row.user_id !== principal.id) throw notFound(ENTITY);
    return row;
  }

  async updateOwn(principal: Principal, id: string, patch: CustomerProfilePatch): Promise<CustomerProfile> {
    await this.getOwn(principal, id);
    return this.update(id, { ...patch, user_id: principal.id });
  }
}
