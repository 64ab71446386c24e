import type {
  AreaSchedule,
  CancellationPeriod,
  Comment,
  CustomerProfile,
  DiscountCode,
  OperatorShift,
  Payment,
  PreReservation,
  Reservation,
  ReservationSlot,
  StaffAttendance,
  TreatmentArea,
} from "@lasercare/shared-schemas";
import { Issues } from "../http/errors.js";

// Entity self-consistency checks, run on the fully merged row before every
// create and update. Each gathers all failing fields into one ValidationError.

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim() === "";
}

function time(value: string): number {
  return Date.parse(value);
}

// previous is undefined on create. Equal instants in different ISO spellings are unchanged.
function instantChanged(next: string | null, previous: string | null | undefined): boolean {
  if (previous === undefined || previous === null || next === null) return next !== previous;
  return time(next) !== time(previous);
}

export function checkTreatmentArea(area: TreatmentArea): void {
  const issues = new Issues();
  if (isBlank(area.name)) issues.add("name", "Area name cannot be empty");
  if (area.current_price < 0) issues.add("current_price", "Price cannot be negative");
  if (area.deadline_reset < 0) issues.add("deadline_reset", "Reset deadline cannot be negative");
  if (area.operate_time < 0) issues.add("operate_time", "Operation time cannot be negative");
  issues.throwIfAny();
}

export function checkAreaSchedule(schedule: AreaSchedule): void {
  const issues = new Issues();
  if (schedule.price < 0) issues.add("price", "Price cannot be negative");
  if (schedule.operate_time < 0) issues.add("operate_time", "Operation time cannot be negative");
  if (schedule.start_time && schedule.end_time && time(schedule.end_time) <= time(schedule.start_time)) {
    issues.add("end_time", "End time must be after start time");
  }
  issues.throwIfAny();
}

export function checkOperatorShift(shift: OperatorShift): void {
  const issues = new Issues();
  if (isBlank(shift.operator_name)) issues.add("operator_name", "Operator name cannot be empty");
  if (shift.operator_name.length > 50) {
    issues.add("operator_name", "Operator name cannot exceed 50 characters");
  }
  issues.throwIfAny();
}

export function checkReservationSlot(slot: ReservationSlot): void {
  if (slot.duration <= 0) {
    new Issues().add("duration", "Duration must be positive").throwIfAny();
  }
}

// A start already in the past is accepted on update when it was not moved.
export function checkCancellationPeriod(
  period: CancellationPeriod,
  now: Date,
  previous: CancellationPeriod | null = null
): void {
  const issues = new Issues();
  if (time(period.end_time) <= time(period.start_time)) {
    issues.add("end_time", "End time must be after start time");
  }
  if (instantChanged(period.start_time, previous?.start_time) && time(period.start_time) < now.getTime()) {
    issues.add("start_time", "Cancellation period cannot start in the past");
  }
  issues.throwIfAny();
}

export function checkReservation(reservation: Reservation): void {
  const issues = new Issues();
  if (reservation.session_number <= 0) issues.add("session_number", "Session number must be positive");
  if (reservation.total_price < 0) issues.add("total_price", "Price cannot be negative");
  if (reservation.final_amount < 0) issues.add("final_amount", "Amount cannot be negative");
  if (reservation.final_amount > reservation.total_price) {
    issues.add("final_amount", "Final amount cannot exceed total price");
  }
  if (
    reservation.reservation_timestamp &&
    reservation.request_timestamp &&
    time(reservation.reservation_timestamp) < time(reservation.request_timestamp)
  ) {
    issues.add("reservation_timestamp", "Reservation timestamp cannot be before request timestamp");
  }
  if (reservation.used_discount_code && !reservation.discount_code) {
    issues.add("discount_code", "Discount code must be provided when used_discount_code is set");
  }
  issues.throwIfAny();
}

export function checkPreReservation(pre: PreReservation): void {
  if (pre.session_count <= 0) {
    new Issues().add("session_count", "Session count must be positive").throwIfAny();
  }
}

export function checkPayment(payment: Payment): void {
  const issues = new Issues();
  if (payment.amount < 0) issues.add("amount", "Payment amount cannot be negative");
  if (payment.payment_type === "PAYPAL" && isBlank(payment.transaction_id)) {
    issues.add("transaction_id", "Transaction id is required for PayPal payments");
  }
  issues.throwIfAny();
}

// valid_until in the past is rejected on create and whenever it is changed.
export function checkDiscountCode(
  code: DiscountCode,
  now: Date,
  previous: DiscountCode | null = null
): void {
  const issues = new Issues();
  if (isBlank(code.code)) issues.add("code", "Discount code cannot be empty");
  if (code.amount < 0) issues.add("amount", "Discount amount cannot be negative");
  if (code.max_usage <= 0) issues.add("max_usage", "Maximum usage must be positive");
  if (code.usage_count > code.max_usage) {
    issues.add("max_usage", "Usage count cannot exceed maximum usage");
  }
  if (
    code.valid_until &&
    instantChanged(code.valid_until, previous?.valid_until) &&
    time(code.valid_until) < now.getTime()
  ) {
    issues.add("valid_until", "Discount code cannot have an expired validity date");
  }
  issues.throwIfAny();
}

export function checkStaffAttendance(attendance: StaffAttendance): void {
  if (
    attendance.entry_timestamp &&
    attendance.exit_timestamp &&
    time(attendance.exit_timestamp) <= time(attendance.entry_timestamp)
  ) {
    new Issues().add("exit_timestamp", "Exit timestamp must be after entry timestamp").throwIfAny();
  }
}

export function checkCustomerProfile(profile: CustomerProfile): void {
  const issues = new Issues();
  if (isBlank(profile.national_id)) issues.add("national_id", "National ID cannot be empty");
  if (profile.offline_appointments < 0) {
    issues.add("offline_appointments", "Offline appointments cannot be negative");
  }
  issues.throwIfAny();
}

export function checkComment(comment: Comment): void {
  if (isBlank(comment.message)) {
    new Issues().add("message", "Comments message cannot be empty").throwIfAny();
  }
}
