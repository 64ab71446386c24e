// Two-decimal amounts are handled in integer cents so repeated discounts never drift.

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function subtractMoney(amount: number, deduction: number): number {
  return fromCents(toCents(amount) - toCents(deduction));
}

export function roundMoney(amount: number): number {
  return fromCents(toCents(amount));
}
