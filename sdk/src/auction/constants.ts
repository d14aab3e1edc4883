// Bounds enforced at construction. Durations are seconds; multipliers are 1e18-scaled.

const UINT192_MAX = (1n << 192n) - 1n;

export const MIN_EPOCH_PERIOD = 10n * 60n; // 10 minutes
export const MAX_EPOCH_PERIOD = 365n * 24n * 60n * 60n; // 1 year

export const MIN_PRICE_MULTIPLIER = 1_100_000_000_000_000_000n; // 1.1x
export const MAX_PRICE_MULTIPLIER = 3_000_000_000_000_000_000n; // 3x

export const ABS_MIN_INIT_PRICE = 1_000_000n;
export const ABS_MAX_INIT_PRICE = UINT192_MAX;

export const MAX_INITIAL_RATE = 10n ** 24n; // units per second
export const MIN_HALVING_PERIOD = 24n * 60n * 60n; // 1 day
export const MAX_HALVING_PERIOD = 4n * 365n * 24n * 60n * 60n; // 4 years
