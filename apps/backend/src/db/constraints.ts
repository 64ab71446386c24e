// Constraint catalog shared by db/schema.sql and the in-memory stores.
// Names must match the constraint names declared in schema.sql.

export type TableName =
  | "users"
  | "staff_attendance"
  | "customer_profiles"
  | "comments"
  | "treatment_areas"
  | "area_schedules"
  | "operator_shifts"
  | "reservation_slots"
  | "reservations"
  | "pre_reservations"
  | "payments"
  | "discount_codes"
  | "cancellation_periods";

export type DeletePolicy = "CASCADE" | "PROTECT" | "SET NULL" | "UNLINK";

export type Relation = {
  name: string;
  child: TableName;
  column: string;
  parent: TableName;
  onDelete: DeletePolicy;
  // UNLINK relations hold an array of parent keys (a link table in Postgres).
  many?: boolean;
};

export type UniqueConstraint = {
  name: string;
  table: TableName;
  columns: string[];
  field: string | null;
  message: string;
};

export const TABLE_LABELS: Record<TableName, string> = {
  users: "user",
  staff_attendance: "staff attendance",
  customer_profiles: "customer profile",
  comments: "comment",
  treatment_areas: "treatment area",
  area_schedules: "area schedule",
  operator_shifts: "operator shifts",
  reservation_slots: "reservation slots",
  reservations: "reservations",
  pre_reservations: "pre-reservations",
  payments: "payments",
  discount_codes: "discount code",
  cancellation_periods: "cancellation period",
};

export const RELATIONS: Relation[] = [
  { name: "staff_attendance_user_id_fkey", child: "staff_attendance", column: "user_id", parent: "users", onDelete: "CASCADE" },
  { name: "customer_profiles_user_id_fkey", child: "customer_profiles", column: "user_id", parent: "users", onDelete: "CASCADE" },
  { name: "comments_user_id_fkey", child: "comments", column: "user_id", parent: "users", onDelete: "CASCADE" },
  { name: "area_schedules_treatment_area_fkey", child: "area_schedules", column: "treatment_area", parent: "treatment_areas", onDelete: "CASCADE" },
  { name: "operator_shifts_operator_id_fkey", child: "operator_shifts", column: "operator_id", parent: "users", onDelete: "PROTECT" },
  { name: "reservation_slots_operator_id_fkey", child: "reservation_slots", column: "operator_id", parent: "users", onDelete: "PROTECT" },
  { name: "reservations_user_id_fkey", child: "reservations", column: "user_id", parent: "users", onDelete: "PROTECT" },
  { name: "reservations_slot_id_fkey", child: "reservations", column: "slot_id", parent: "reservation_slots", onDelete: "PROTECT" },
  { name: "reservations_treatment_area_fkey", child: "reservations", column: "treatment_area", parent: "treatment_areas", onDelete: "PROTECT" },
  { name: "reservations_discount_code_fkey", child: "reservations", column: "discount_code", parent: "discount_codes", onDelete: "SET NULL" },
  {
    name: "reservation_area_schedules_area_schedule_id_fkey",
    child: "reservations",
    column: "area_schedule_ids",
    parent: "area_schedules",
    onDelete: "UNLINK",
    many: true,
  },
  { name: "pre_reservations_user_id_fkey", child: "pre_reservations", column: "user_id", parent: "users", onDelete: "PROTECT" },
  { name: "pre_reservations_area_schedule_id_fkey", child: "pre_reservations", column: "area_schedule_id", parent: "area_schedules", onDelete: "PROTECT" },
  { name: "payments_user_id_fkey", child: "payments", column: "user_id", parent: "users", onDelete: "PROTECT" },
  { name: "payments_reservation_id_fkey", child: "payments", column: "reservation_id", parent: "reservations", onDelete: "PROTECT" },
];

export const UNIQUE_CONSTRAINTS: UniqueConstraint[] = [
  { name: "users_username_key", table: "users", columns: ["username"], field: "username", message: "A user with that username already exists." },
  { name: "treatment_areas_pkey", table: "treatment_areas", columns: ["name"], field: "name", message: "A treatment area with this name already exists." },
  { name: "customer_profiles_national_id_key", table: "customer_profiles", columns: ["national_id"], field: "national_id", message: "A customer profile with this national id already exists." },
  { name: "customer_profiles_user_id_key", table: "customer_profiles", columns: ["user_id"], field: "user_id", message: "This user already has a customer profile." },
  { name: "discount_codes_pkey", table: "discount_codes", columns: ["code"], field: "code", message: "A discount code with this code already exists." },
  { name: "payments_transaction_id_key", table: "payments", columns: ["transaction_id"], field: "transaction_id", message: "A payment with this transaction id already exists." },
  {
    name: "operator_shifts_operator_date_period_key",
    table: "operator_shifts",
    columns: ["operator_id", "shift_date", "period"],
    field: null,
    message: "An operator shift for this operator, date and period already exists.",
  },
  {
    name: "reservation_slots_operator_date_slot_key",
    table: "reservation_slots",
    columns: ["operator_id", "date", "time_slot"],
    field: null,
    message: "A reservation slot for this operator, date and time slot already exists.",
  },
];

export function relationByName(name: string): Relation | undefined {
  return RELATIONS.find((r) => r.name === name);
}

export function uniqueByName(name: string): UniqueConstraint | undefined {
  return UNIQUE_CONSTRAINTS.find((u) => u.name === name);
}
