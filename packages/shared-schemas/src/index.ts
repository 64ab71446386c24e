// packages/shared-schemas/src/index.ts
export * from './domain/common.js';
export * from './domain/money.js';
export * from './domain/user.js';
export * from './domain/accounts.js';
export * from './domain/staff.js';
export * from './domain/comment.js';
export * from './domain/catalog.js';
export * from './domain/scheduling.js';
export * from './domain/reservation.js';
export * from './domain/payment.js';
