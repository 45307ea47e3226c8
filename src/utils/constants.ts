/**
 * Shared constants for analysis, rebalancing and projection.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Buys and sells within this many dollars of each other count as balanced. */
export const BALANCE_TOLERANCE = 0.01;

/** An untagged "Other" bucket at or below this value (dollars) is never rebalanced. */
export const OTHER_MIN_REBALANCE_VALUE = 1;

/** Default rebalancing band, in percentage points either side of target. */
export const DEFAULT_TOLERANCE_PCT = 2.0;

export const DEFAULT_TRIALS = 1000;

export const DEFAULT_END_AGE = 95;

export const DEFAULT_INFLATION_RATE = 0.03;

export const DEFAULT_PESSIMISTIC_PERCENTILE = 10;

export const DEFAULT_OPTIMISTIC_PERCENTILE = 90;

/** Oldest age a projection may run to. */
export const MAX_END_AGE = 120;

/** Highest inflation rate accepted for a projection (as a decimal). */
export const MAX_INFLATION_RATE = 0.2;
