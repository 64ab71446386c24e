import { AccountService } from "./auth/accountService.js";
import { TokenService, type TokenSettings } from "./auth/tokens.js";
import { AreaScheduleService, TreatmentAreaService } from "./catalog/catalogService.js";
import type { ServiceContext } from "./entityService.js";
import { CommentService } from "./feedback/commentService.js";
import { AttendanceService } from "./identity/attendanceService.js";
import { CustomerProfileService } from "./identity/customerProfileService.js";
import { UserService } from "./identity/userService.js";
import type { UserStore } from "./identity/userStore.js";
import { DiscountCodeService, PaymentService } from "./payments/paymentService.js";
import { PreReservationService, ReservationService } from "./reservations/reservationService.js";
import {
  CancellationPeriodService,
  ShiftService,
  SlotService,
} from "./scheduling/schedulingService.js";
import type { Stores } from "./stores.js";

export type Services = {
  userStore: UserStore;
  tokens: TokenService;
  accounts: AccountService;
  users: UserService;
  attendance: AttendanceService;
  customerProfiles: CustomerProfileService;
  comments: CommentService;
  treatmentAreas: TreatmentAreaService;
  areaSchedules: AreaScheduleService;
  shifts: ShiftService;
  slots: SlotService;
  cancellationPeriods: CancellationPeriodService;
  reservations: ReservationService;
  preReservations: PreReservationService;
  payments: PaymentService;
  discountCodes: DiscountCodeService;
};

export type ServiceOptions = {
  tokens: TokenSettings;
  passwordIterations?: number;
};

export function createServices(stores: Stores, ctx: ServiceContext, options: ServiceOptions): Services {
  const tokens = new TokenService(options.tokens);
  const users = new UserService(stores.users, ctx, { passwordIterations: options.passwordIterations });
  return {
    userStore: stores.users,
    tokens,
    accounts: new AccountService(stores.users, users, tokens, ctx),
    users,
    attendance: new AttendanceService(stores.attendance, stores.users, ctx),
    customerProfiles: new CustomerProfileService(stores.customerProfiles, stores.users, ctx),
    comments: new CommentService(stores.comments, stores.users, ctx),
    treatmentAreas: new TreatmentAreaService(stores.treatmentAreas, ctx),
    areaSchedules: new AreaScheduleService(stores.areaSchedules, ctx),
    shifts: new ShiftService(stores.shifts, stores.users, ctx),
    slots: new SlotService(stores.slots, ctx),
    cancellationPeriods: new CancellationPeriodService(stores.cancellationPeriods, ctx),
    reservations: new ReservationService(stores.reservations, stores.slots, stores.users, ctx),
    preReservations: new PreReservationService(stores.preReservations, stores.users, ctx),
    payments: new PaymentService(stores.payments, stores.reservations, stores.discounts, stores.users, ctx),
    discountCodes: new DiscountCodeService(stores.discountCodes, ctx),
  };
}
