/**
 * Numeric helpers shared by the analysis, rebalancing and projection engines.
 */

/**
 * Rounds half away from zero to the given number of decimals, matching currency display.
 * Works on the decimal string form so values like 1.005 round up as written.
 *
 * @example
 * ```ts
 * roundHalfUp(1.005)   // 1.01
 * roundHalfUp(-2.345)  // -2.35
 * ```
 */
export function roundHalfUp(value: number, decimals: number = 2): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const sign = value < 0 ? -1 : 1;
  const text = String(Math.abs(value));
  const factor = Math.pow(10, decimals);
  // exponent notation ("1e-7") cannot take a second exponent
  const shifted = text.includes("e")
    ? Math.round(Math.abs(value) * factor)
    : Math.round(Number(`${text}e${decimals}`));
  if (shifted === 0) {
    return 0;
  }
  return (sign * shifted) / factor;
}

export function sum(values: number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

/**
 * Percentile with linear interpolation between closest ranks.
 *
 * @param values - Sample values (not modified)
 * @param percentile - 0-100
 */
export function percentile(values: number[], percentile: number): number {
  if (values.length === 0) {
    return NaN;
  }
  const sorted = [...values].sort((a, b) => a - b);
  return percentileOfSorted(sorted, percentile);
}

export function percentileOfSorted(sorted: number[], percentile: number): number {
  if (sorted.length === 0) {
    return NaN;
  }
  const position = ((sorted.length - 1) * percentile) / 100;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) {
    return sorted[lower];
  }
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: number[]): number {
  return percentile(values, 50);
}

/**
 * Grows an amount at a constant annual rate.
 * Formula: FV = PV × (1 + r)^n
 */
export function inflate(amount: number, rate: number, years: number): number {
  return amount * Math.pow(1 + rate, years);
}
