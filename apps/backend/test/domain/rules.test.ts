import { describe, expect, it } from "vitest";
import type {
  AreaSchedule,
  CancellationPeriod,
  DiscountCode,
  Payment,
  Reservation,
} from "@lasercare/shared-schemas";
import {
  checkAreaSchedule,
  checkCancellationPeriod,
  checkDiscountCode,
  checkPayment,
  checkReservation,
  checkTreatmentArea,
} from "../../src/domain/rules.js";
import { ValidationError } from "../../src/http/errors.js";

const now = new Date("2025-03-10T09:00:00.000Z");
const stamp = "2025-01-01T00:00:00.000Z";

function details(fn: () => void) {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.details;
    throw err;
  }
  return null;
}

describe("checkTreatmentArea", () => {
  it("reports every failing field at once", () => {
    const result = details(() =>
      checkTreatmentArea({
        name: " ",
        current_price: -10,
        deadline_reset: 30,
        is_active: true,
        operate_time: 5,
        created_at: stamp,
        updated_at: stamp,
      })
    );
    expect(result).toEqual({
      formErrors: [],
      fieldErrors: {
        name: ["Area name cannot be empty"],
        current_price: ["Price cannot be negative"],
      },
    });
  });

  it("accepts a zero operate time", () => {
    const area = {
      name: "Legs",
      current_price: 0,
      deadline_reset: 30,
      is_active: true,
      operate_time: 0,
      created_at: stamp,
      updated_at: stamp,
    };
    expect(details(() => checkTreatmentArea(area))).toBeNull();
  });
});

describe("checkAreaSchedule", () => {
  const schedule: AreaSchedule = {
    id: "4f6a2f0e-8c1b-4d3e-9f2a-5b6c7d8e9f01",
    treatment_area: "Legs",
    price: 10,
    start_time: null,
    end_time: null,
    operate_time: 5,
    created_at: stamp,
    updated_at: stamp,
  };

  it("rejects a negative price and operate time", () => {
    expect(details(() => checkAreaSchedule({ ...schedule, price: -1, operate_time: -5 }))?.fieldErrors).toEqual({
      price: ["Price cannot be negative"],
      operate_time: ["Operation time cannot be negative"],
    });
  });
});

describe("checkReservation", () => {
  const base: Reservation = {
    id: "4f6a2f0e-8c1b-4d3e-9f2a-5b6c7d8e9f01",
    user_id: 1,
    slot_id: "a1b2c3d4-e5f6-4789-8abc-def012345678",
    treatment_area: null,
    area_schedule_ids: [],
    session_number: 1,
    reservation_type: "STANDARD",
    is_online: true,
    is_charged: false,
    is_paid: false,
    used_discount_code: false,
    total_price: 100,
    final_amount: 100,
    discount_code: null,
    reservation_timestamp: null,
    request_timestamp: null,
    created_at: stamp,
    updated_at: stamp,
  };

  it("accepts a consistent reservation", () => {
    expect(details(() => checkReservation(base))).toBeNull();
  });

  it("rejects a final amount above the total", () => {
    expect(details(() => checkReservation({ ...base, final_amount: 120 }))?.fieldErrors).toEqual({
      final_amount: ["Final amount cannot exceed total price"],
    });
  });

  it("rejects negative prices", () => {
    expect(details(() => checkReservation({ ...base, total_price: -10, final_amount: -20 }))?.fieldErrors).toEqual({
      total_price: ["Price cannot be negative"],
      final_amount: ["Amount cannot be negative"],
    });
  });

  it("rejects a reservation time before the request time", () => {
    const early = {
      ...base,
      request_timestamp: "2025-03-05T10:00:00.000Z",
      reservation_timestamp: "2025-03-05T09:00:00.000Z",
    };
    expect(details(() => checkReservation(early))?.fieldErrors).toEqual({
      reservation_timestamp: ["Reservation timestamp cannot be before request timestamp"],
    });
  });

  it("requires the code when a discount was used", () => {
    expect(details(() => checkReservation({ ...base, used_discount_code: true }))?.fieldErrors).toEqual({
      discount_code: ["Discount code must be provided when used_discount_code is set"],
    });
  });
});

describe("checkPayment", () => {
  const base: Payment = {
    id: "4f6a2f0e-8c1b-4d3e-9f2a-5b6c7d8e9f01",
    user_id: 1,
    reservation_id: "a1b2c3d4-e5f6-4789-8abc-def012345678",
    amount: 50,
    status: "PENDING",
    payment_type: "PAYPAL",
    transaction_id: "TX-1",
    payment_timestamp: null,
    created_at: stamp,
    updated_at: stamp,
  };

  it("requires a transaction id for PayPal", () => {
    expect(details(() => checkPayment({ ...base, transaction_id: null }))?.fieldErrors).toEqual({
      transaction_id: ["Transaction id is required for PayPal payments"],
    });
  });

  it("rejects a negative amount", () => {
    expect(details(() => checkPayment({ ...base, amount: -1 }))?.fieldErrors).toEqual({
      amount: ["Payment amount cannot be negative"],
    });
  });

  it("does not require one for other payment types", () => {
    expect(details(() => checkPayment({ ...base, payment_type: "CREDIT_CARD", transaction_id: null }))).toBeNull();
  });
});

describe("checkCancellationPeriod", () => {
  const period: CancellationPeriod = {
    id: "4f6a2f0e-8c1b-4d3e-9f2a-5b6c7d8e9f01",
    start_time: "2025-03-01T00:00:00.000Z",
    end_time: "2025-03-20T00:00:00.000Z",
    created_at: stamp,
    updated_at: stamp,
  };

  it("rejects a new period starting in the past", () => {
    expect(details(() => checkCancellationPeriod(period, now))?.fieldErrors).toEqual({
      start_time: ["Cancellation period cannot start in the past"],
    });
  });

  it("keeps an unchanged past start on update", () => {
    const moved = { ...period, end_time: "2025-03-25T00:00:00.000Z" };
    expect(details(() => checkCancellationPeriod(moved, now, period))).toBeNull();
  });

  it("treats the same instant in another spelling as unchanged", () => {
    const respelled = { ...period, start_time: "2025-03-01T00:00:00Z" };
    expect(details(() => checkCancellationPeriod(respelled, now, period))).toBeNull();
  });

  it("requires the end after the start", () => {
    const inverted = { ...period, start_time: "2025-04-02T00:00:00.000Z", end_time: "2025-04-01T00:00:00.000Z" };
    expect(details(() => checkCancellationPeriod(inverted, now))?.fieldErrors).toEqual({
      end_time: ["End time must be after start time"],
    });
  });
});

describe("checkDiscountCode", () => {
  const discount: DiscountCode = {
    code: "SPRING",
    amount: 10,
    is_used: false,
    valid_until: "2025-03-01T00:00:00.000Z",
    max_usage: 1,
    usage_count: 0,
    created_at: stamp,
    updated_at: stamp,
  };

  it("rejects an expired validity date on create", () => {
    expect(details(() => checkDiscountCode(discount, now))?.fieldErrors).toEqual({
      valid_until: ["Discount code cannot have an expired validity date"],
    });
  });

  it("ignores an expired date that was not changed", () => {
    expect(details(() => checkDiscountCode({ ...discount, amount: 5 }, now, discount))).toBeNull();
  });

  it("treats a re-sent validity date in another spelling as unchanged", () => {
    const respelled = { ...discount, valid_until: "2025-03-01T00:00:00Z" };
    expect(details(() => checkDiscountCode(respelled, now, discount))).toBeNull();
  });

  it("rejects a negative amount", () => {
    expect(details(() => checkDiscountCode({ ...discount, valid_until: null, amount: -5 }, now))?.fieldErrors).toEqual({
      amount: ["Discount amount cannot be negative"],
    });
  });

  it("rejects a non-positive maximum usage", () => {
    const result = details(() => checkDiscountCode({ ...discount, valid_until: null, max_usage: 0 }, now));
    expect(result?.fieldErrors).toEqual({
      max_usage: ["Maximum usage must be positive"],
    });
  });
});
