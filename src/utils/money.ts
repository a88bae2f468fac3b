/**
 * Money helpers. Amounts travel as two-decimal numbers (and DECIMAL(10, 2)
 * strings from pg) but are summed in integer cents.
 */

export const toCents = (amount: number | string): number => Math.round(Number(amount) * 100);

export const fromCents = (cents: number): number => cents / 100;

export const lineTotalCents = (unitPrice: number | string, quantity: number): number =>
  toCents(unitPrice) * quantity;

export const sumLineTotals = (items: ReadonlyArray<{ unit_price: number; quantity: number }>): number =>
  fromCents(items.reduce((total, item) => total + lineTotalCents(item.unit_price, item.quantity), 0));

/** Money schema helper: at most two decimal places */
export const hasAtMostTwoDecimals = (amount: number): boolean =>
  Math.abs(amount * 100 - Math.round(amount * 100)) < 1e-6;
