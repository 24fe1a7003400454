export interface CurrencySettings {
  code: string;
  /** Number of minor-unit digits: 0 for XAF, 2 for EUR. */
  decimals: number;
}

/** Amounts are stored as integer minor units; this is for printed and displayed text only. */
export function formatMoney(minorUnits: number, currency: CurrencySettings): string {
  const major = minorUnits / 10 ** currency.decimals;
  return `${major.toFixed(currency.decimals)} ${currency.code}`;
}

/** Line subtotal in minor units for a possibly fractional quantity. */
export function lineSubtotal(quantity: number, unitPrice: number): number {
  return Math.round(quantity * unitPrice);
}
