export interface RentalRecord {
  rentalId: number;
  carId: number | null;
  /** "connect" (keyless) or "mobile" (in-person handover) */
  checkinType: string;
  state: string;
  /** Positive when the car came back late, null when checkout was not observed. */
  delayAtCheckoutInMinutes: number | null;
  previousEndedRentalId: number | null;
  /** Minutes between the previous rental's scheduled end and this one's scheduled start. */
  timeDeltaWithPreviousRentalInMinutes: number | null;
}

export interface RentalDataset {
  records: readonly RentalRecord[];
  source: string;
  loadedAt: Date;
}

export interface RentalDatasetOptions {
  /** Explicit source file; when unset the candidate paths are tried in order. */
  dataPath?: string;
  candidatePaths: readonly string[];
  preload: boolean;
}

export type RentalDatasetStatus =
  | { state: "idle" }
  | { state: "loading" }
  | { state: "loaded"; source: string; rowCount: number; loadedAt: string }
  | { state: "failed"; error: string };
