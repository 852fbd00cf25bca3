export const RENTAL_DATASET_OPTIONS = Symbol("RENTAL_DATASET_OPTIONS");

export const REQUIRED_RENTAL_COLUMNS = [
  "rental_id",
  "checkin_type",
  "state",
  "delay_at_checkout_in_minutes",
  "previous_ended_rental_id",
  "time_delta_with_previous_rental_in_minutes",
] as const;

export const OPTIONAL_RENTAL_COLUMNS = ["car_id"] as const;

/** Spreadsheet exports often carry their row index as "Unnamed: 0". */
export const UNNAMED_COLUMN_PREFIX = "unnamed";

export const MAX_REPORTED_ROW_ERRORS = 20;
