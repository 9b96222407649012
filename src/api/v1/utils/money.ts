// Prices carry two decimals; arithmetic happens on integer cents.

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function multiplyPrice(unitPrice: number, quantity: number): number {
  return fromCents(toCents(unitPrice) * quantity);
}

export function hasAtMostTwoDecimals(amount: number): boolean {
  return Math.abs(amount * 100 - Math.round(amount * 100)) < 1e-6;
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
