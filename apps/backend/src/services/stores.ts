import type pg from "pg";
import {
  AreaScheduleSchema,
  CancellationPeriodSchema,
  CommentSchema,
  CustomerProfileSchema,
  DiscountCodeSchema,
  OperatorShiftSchema,
  PaymentSchema,
  PreReservationSchema,
  ReservationSlotSchema,
  StaffAttendanceSchema,
  TreatmentAreaSchema,
  type AreaSchedule,
  type CancellationPeriod,
  type Comment,
  type CustomerProfile,
  type DiscountCode,
  type OperatorShift,
  type Payment,
  type PreReservation,
  type Reservation,
  type ReservationSlot,
  type StaffAttendance,
  type TreatmentArea,
} from "@lasercare/shared-schemas";
import { PgTable, type Table } from "../db/table.js";
import { MemoryDatabase, MemoryTable } from "./memory/memoryDatabase.js";
import { MemoryUserStore, PgUserStore, type UserStore } from "./identity/userStore.js";
import { PgReservationStore, type ReservationStore } from "./reservations/reservationStore.js";
import {
  DISCOUNT_CODE_COLUMNS,
  MemoryDiscountLedger,
  PAYMENT_COLUMNS,
  PgDiscountLedger,
  type DiscountLedger,
} from "./payments/paymentStore.js";

export type Stores = {
  users: UserStore;
  attendance: Table<StaffAttendance, "id">;
  customerProfiles: Table<CustomerProfile, "id">;
  comments: Table<Comment, "id">;
  treatmentAreas: Table<TreatmentArea, "name">;
  areaSchedules: Table<AreaSchedule, "id">;
  shifts: Table<OperatorShift, "id">;
  slots: Table<ReservationSlot, "id">;
  cancellationPeriods: Table<CancellationPeriod, "id">;
  reservations: ReservationStore;
  preReservations: Table<PreReservation, "id">;
  payments: Table<Payment, "id">;
  discountCodes: Table<DiscountCode, "code">;
  discounts: DiscountLedger;
};

export function createPgStores(pool: pg.Pool): Stores {
  return {
    users: new PgUserStore(pool),
    attendance: new PgTable<StaffAttendance, "id">(pool, {
      table: "staff_attendance",
      key: "id",
      schema: StaffAttendanceSchema,
      columns: ["id", "user_id", "entry_timestamp", "exit_timestamp", "has_exited", "created_at", "updated_at"],
    }),
    customerProfiles: new PgTable<CustomerProfile, "id">(pool, {
      table: "customer_profiles",
      key: "id",
      schema: CustomerProfileSchema,
      columns: [
        "id",
        "user_id",
        "national_id",
        "address",
        "house_number",
        "has_medical_history",
        "has_drug_history",
        "primary_physician",
        "is_premium",
        "offline_appointments",
        "last_visit_date",
        "created_at",
        "updated_at",
      ],
    }),
    comments: new PgTable<Comment, "id">(pool, {
      table: "comments",
      key: "id",
      schema: CommentSchema,
      columns: ["id", "user_id", "message", "is_reviewed", "created_at", "updated_at"],
    }),
    treatmentAreas: new PgTable<TreatmentArea, "name">(pool, {
      table: "treatment_areas",
      key: "name",
      schema: TreatmentAreaSchema,
      columns: ["name", "current_price", "deadline_reset", "is_active", "operate_time", "created_at", "updated_at"],
      orderBy: "name",
    }),
    areaSchedules: new PgTable<AreaSchedule, "id">(pool, {
      table: "area_schedules",
      key: "id",
      schema: AreaScheduleSchema,
      columns: ["id", "treatment_area", "price", "start_time", "end_time", "operate_time", "created_at", "updated_at"],
    }),
    shifts: new PgTable<OperatorShift, "id">(pool, {
      table: "operator_shifts",
      key: "id",
      schema: OperatorShiftSchema,
      columns: ["id", "operator_id", "operator_name", "shift_date", "period", "created_at", "updated_at"],
      orderBy: "shift_date, period",
    }),
    slots: new PgTable<ReservationSlot, "id">(pool, {
      table: "reservation_slots",
      key: "id",
      schema: ReservationSlotSchema,
      columns: ["id", "operator_id", "date", "period", "time_slot", "duration", "created_at", "updated_at"],
      orderBy: "date, time_slot",
    }),
    cancellationPeriods: new PgTable<CancellationPeriod, "id">(pool, {
      table: "cancellation_periods",
      key: "id",
      schema: CancellationPeriodSchema,
      columns: ["id", "start_time", "end_time", "created_at", "updated_at"],
      orderBy: "start_time",
    }),
    reservations: new PgReservationStore(pool),
    preReservations: new PgTable<PreReservation, "id">(pool, {
      table: "pre_reservations",
      key: "id",
      schema: PreReservationSchema,
      columns: ["id", "user_id", "area_schedule_id", "session_count", "last_session_date", "created_at", "updated_at"],
    }),
    payments: new PgTable<Payment, "id">(pool, {
      table: "payments",
      key: "id",
      schema: PaymentSchema,
      columns: PAYMENT_COLUMNS,
    }),
    discountCodes: new PgTable<DiscountCode, "code">(pool, {
      table: "discount_codes",
      key: "code",
      schema: DiscountCodeSchema,
      columns: DISCOUNT_CODE_COLUMNS,
    }),
    discounts: new PgDiscountLedger(pool),
  };
}

/** Process-local stores for STORE_DRIVER=memory and the test suite. */
export function createMemoryStores(db = new MemoryDatabase()): Stores {
  const payments = new MemoryTable<Payment, "id">(db, { table: "payments", key: "id" });
  const discountCodes = new MemoryTable<DiscountCode, "code">(db, { table: "discount_codes", key: "code" });
  return {
    users: new MemoryUserStore(db),
    attendance: new MemoryTable<StaffAttendance, "id">(db, { table: "staff_attendance", key: "id" }),
    customerProfiles: new MemoryTable<CustomerProfile, "id">(db, { table: "customer_profiles", key: "id" }),
    comments: new MemoryTable<Comment, "id">(db, { table: "comments", key: "id" }),
    treatmentAreas: new MemoryTable<TreatmentArea, "name">(db, { table: "treatment_areas", key: "name" }),
    areaSchedules: new MemoryTable<AreaSchedule, "id">(db, { table: "area_schedules", key: "id" }),
    shifts: new MemoryTable<OperatorShift, "id">(db, { table: "operator_shifts", key: "id" }),
    slots: new MemoryTable<ReservationSlot, "id">(db, { table: "reservation_slots", key: "id" }),
    cancellationPeriods: new MemoryTable<CancellationPeriod, "id">(db, { table: "cancellation_periods", key: "id" }),
    reservations: new MemoryTable<Reservation, "id">(db, {
      table: "reservations",
      key: "id",
      detach: {
        discount_code: (row) => ({ ...row, discount_code: null }),
        area_schedule_ids: (row, id) => ({
          ...row,
          area_schedule_ids: row.area_schedule_ids.filter((s) => s !== id),
        }),
      },
    }),
    preReservations: new MemoryTable<PreReservation, "id">(db, { table: "pre_reservations", key: "id" }),
    payments,
    discountCodes,
    discounts: new MemoryDiscountLedger(payments, discountCodes),
  };
}
