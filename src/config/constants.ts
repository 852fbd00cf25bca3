export const DATASET_FILE_BASENAME = "get_around_delay_analysis";

export const DEFAULT_DATASET_PATHS = [
  `${DATASET_FILE_BASENAME}.xlsx`,
  `${DATASET_FILE_BASENAME}.csv`,
  `data/${DATASET_FILE_BASENAME}.xlsx`,
  `data/${DATASET_FILE_BASENAME}.csv`,
] as const;

export const CHECKIN_TYPE_CONNECT = "connect";
export const CHECKIN_TYPE_MOBILE = "mobile";
export const RENTAL_STATE_CANCELED = "canceled";
