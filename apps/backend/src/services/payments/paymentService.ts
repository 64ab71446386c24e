import { randomUUID } from "node:crypto";
import type {
  DiscountCode,
  DiscountCodeInput,
  DiscountCodePatch,
  Payment,
  PaymentInput,
  PaymentPatch,
} from "@lasercare/shared-schemas";
import type { Table } from "../../db/table.js";
import { isValidCode } from "../../domain/discount.js";
import { roundMoney } from "../../domain/money.js";
import { checkDiscountCode, checkPayment } from "../../domain/rules.js";
import { ValidationError } from "../../http/errors.js";
import type { Principal } from "../auth/principal.js";
import { EntityService, notFound, runWrite, type ServiceContext } from "../entityService.js";
import type { UserStore } from "../identity/userStore.js";
import type { ReservationStore } from "../reservations/reservationStore.js";
import { matchesSearch, usernamesById } from "../search.js";
import type { DiscountLedger } from "./paymentStore.js";

const ENTITY = "payment";

export type CustomerPaymentInput = Omit<PaymentInput, "user_id">;

export class PaymentService extends EntityService<Payment, "id", PaymentInput, PaymentPatch> {
  constructor(
    table: Table<Payment, "id">,
    private readonly reservations: ReservationStore,
    private readonly discounts: DiscountLedger,
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
          reservation_id: input.reservation_id,
          amount: roundMoney(input.amount),
          status: input.status ?? "PENDING",
          payment_type: input.payment_type ?? "PAYPAL",
          transaction_id: input.transaction_id || null,
          payment_timestamp: input.payment_timestamp ?? null,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => ({
          ...existing,
          ...patch,
          amount: roundMoney(patch.amount ?? existing.amount),
          transaction_id:
            patch.transaction_id === undefined ? existing.transaction_id : patch.transaction_id || null,
        }),
        check: (row) => checkPayment(row),
      },
      ctx
    );
  }

  async search(term?: string): Promise<Payment[]> {
    const [rows, names] = await Promise.all([this.list(), usernamesById(this.users)]);
    return rows.filter((r) => matchesSearch(term, [names.get(r.user_id), r.transaction_id]));
  }

  pending(): Promise<Payment[]> {
    return this.list({ status: "PENDING" });
  }

  // The payer is the caller and the reservation must be one of theirs.
  async createOwn(principal: Principal, input: CustomerPaymentInput): Promise<Payment> {
    const reservation = await this.reservations.get(input.reservation_id);
    if (!reservation || reservation.user_id !== principal.id) {
      throw ValidationError.field("reservation_id", "Reservation does not belong to the current user.");
    }
    return this.create({ ...input, user_id: principal.id });
  }

  listOwn(principal: Principal): Promise<Payment[]> {
    return this.list({ user_id: principal.id });
  }

  async getOwn(principal: Principal, id: string): Promise<Payment> {
    const row = await this.find(id);
    if (!row || row.user_id !== principal.id) throw notFound(ENTITY);
    return row;
  }

  async applyDiscount(id: string, code: string): Promise<Payment> {
    return runWrite(this.ctx, ENTITY, "apply discount to", async () => {
      const result = await this.discounts.apply(id, code, this.ctx.clock());
      if (!result) throw notFound(ENTITY);
      this.ctx.log.info(
        { entity: ENTITY, key: id, code, usage_count: result.discount.usage_count },
        "discount code applied"
      );
      return result.payment;
    });
  }

  async applyDiscountOwn(principal: Principal, id: string, code: string): Promise<Payment> {
    await this.getOwn(principal, id);
    return this.applyDiscount(id, code);
  }
}

export class DiscountCodeService extends EntityService<
  DiscountCode,
  "code",
  DiscountCodeInput,
  DiscountCodePatch
> {
  constructor(table: Table<DiscountCode, "code">, ctx: ServiceContext) {
    super(
      table,
      {
        entity: "discount code",
        build: (input, now) => ({
          code: input.code,
          amount: roundMoney(input.amount),
          is_used: input.is_used ?? false,
          valid_until: input.valid_until ?? null,
          max_usage: input.max_usage ?? 1,
          usage_count: 0,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        }),
        merge: (existing, patch) => {
          const max_usage = patch.max_usage ?? existing.max_usage;
          return {
            ...existing,
            ...patch,
            amount: roundMoney(patch.amount ?? existing.amount),
            is_used: (patch.is_used ?? existing.is_used) || existing.usage_count >= max_usage,
          };
        },
        check: (row, previous, now) => checkDiscountCode(row, now, previous),
      },
      ctx
    );
  }

  async search(term?: string): Promise<DiscountCode[]> {
    const rows = await this.list();
    return rows.filter((r) => matchesSearch(term, [r.code]));
  }

  async valid(): Promise<DiscountCode[]> {
    const now = this.ctx.clock();
    const rows = await this.list();
    return rows.filter((r) => isValidCode(r, now));
  }

  async getValid(code: string): Promise<DiscountCode> {
    const row = await this.find(code);
    if (!row || !isValidCode(row, this.ctx.clock())) throw notFound("discount code");
    return row;
  }
}
