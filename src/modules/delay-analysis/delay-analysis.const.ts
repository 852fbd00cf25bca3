export const RENTAL_SCOPE_VALUES = ["all", "connect"] as const;

/** Checkout delays beyond ±12h come from corrupted timestamps. */
export const DELAY_CLAMP_MINUTES = 720;

export const DEFAULT_THRESHOLD_MINUTES = 90;
export const RECOMMENDED_THRESHOLD_MINUTES = 120;

export const DEFAULT_SWEEP_FROM_MINUTES = 0;
export const DEFAULT_SWEEP_TO_MINUTES = 300;
export const DEFAULT_SWEEP_STEP_MINUTES = 30;
export const MAX_SWEEP_POINTS = 200;

/** Connect must keep at least this share of the problems solved for all cars. */
export const CONNECT_MIN_COVERAGE_RATIO = 0.7;

export const GAP_DISTRIBUTION_MAX_MINUTES = 480;
export const DEFAULT_GAP_BIN_MINUTES = 60;
