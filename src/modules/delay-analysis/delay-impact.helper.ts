import { CHECKIN_TYPE_CONNECT } from "../../config/constants";
import type { RentalRecord } from "../rental-dataset/rental-dataset.interface";
import {
  DEFAULT_SWEEP_FROM_MINUTES,
  DEFAULT_SWEEP_STEP_MINUTES,
  DEFAULT_SWEEP_TO_MINUTES,
  DELAY_CLAMP_MINUTES,
} from "./delay-analysis.const";
import type {
  HandoverEvaluation,
  HandoverObservation,
  PreviousDelayLookup,
  RentalScope,
  ThresholdImpact,
  ThresholdSweepRow,
} from "./delay-analysis.interface";

export function clampDelay(delay: number | null): number | null {
  if (delay === null) {
    return null;
  }
  return Math.min(DELAY_CLAMP_MINUTES, Math.max(-DELAY_CLAMP_MINUTES, delay));
}

export function hasPreviousRental(rental: RentalRecord): boolean {
  return rental.previousEndedRentalId !== null;
}

export function isConnectRental(rental: RentalRecord): boolean {
  return rental.checkinType.toLowerCase() === CHECKIN_TYPE_CONNECT;
}

export function filterByScope(
  rentals: readonly RentalRecord[],
  scope: RentalScope,
): readonly RentalRecord[] {
  return scope === "connect" ? rentals.filter(isConnectRental) : rentals;
}

/**
 * Must be built from the full table: a predecessor outside the scoped
 * population still contributes its delay.
 */
export function buildPreviousDelayLookup(rentals: readonly RentalRecord[]): PreviousDelayLookup {
  const lookup = new Map<number, number | null>();
  for (const rental of rentals) {
    lookup.set(rental.rentalId, clampDelay(rental.delayAtCheckoutInMinutes));
  }
  return lookup;
}

export function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/**
 * Comparisons against a missing gap or a missing predecessor delay are false,
 * so such rows are never problems and never blocked.
 */
export function observeHandover(
  rental: RentalRecord,
  lookup: PreviousDelayLookup,
): HandoverObservation {
  const gapInMinutes = rental.timeDeltaWithPreviousRentalInMinutes;
  const previousDelayInMinutes =
    rental.previousEndedRentalId === null
      ? null
      : (lookup.get(rental.previousEndedRentalId) ?? null);

  const comparable = previousDelayInMinutes !== null && gapInMinutes !== null;

  return {
    rental,
    gapInMinutes,
    previousDelayInMinutes,
    causesProblem: comparable && previousDelayInMinutes > gapInMinutes,
    waitTimeInMinutes: comparable ? Math.max(0, previousDelayInMinutes - gapInMinutes) : 0,
  };
}

export function evaluateHandover(
  rental: RentalRecord,
  lookup: PreviousDelayLookup,
  thresholdMinutes: number,
): HandoverEvaluation {
  const observation = observeHandover(rental, lookup);
  const wouldBeBlocked =
    observation.gapInMinutes !== null && observation.gapInMinutes < thresholdMinutes;

  return {
    ...observation,
    wouldBeBlocked,
    problemSolved: observation.causesProblem && wouldBeBlocked,
  };
}

/**
 * Cost and benefit of refusing bookings that start less than
 * `thresholdMinutes` after the previous rental of the same car ends.
 *
 * `lookup` defaults to one built from `rentals`; pass a shared one when
 * calling repeatedly over the same table.
 */
export function calculateThresholdImpact(
  rentals: readonly RentalRecord[],
  thresholdMinutes: number,
  scope: RentalScope = "all",
  lookup: PreviousDelayLookup = buildPreviousDelayLookup(rentals),
): ThresholdImpact {
  const population = filterByScope(rentals, scope);
  const evaluations = population
    .filter(hasPreviousRental)
    .map((rental) => evaluateHandover(rental, lookup, thresholdMinutes));

  const totalRentals = population.length;
  const rentalsWithPrevious = evaluations.length;
  const blockedRentals = evaluations.filter((evaluation) => evaluation.wouldBeBlocked).length;
  const currentProblems = evaluations.filter((evaluation) => evaluation.causesProblem).length;
  const problemsSolved = evaluations.filter((evaluation) => evaluation.problemSolved).length;

  return {
    totalRentals,
    rentalsWithPrevious,
    blockedRentals,
    blockedPercentage: percentage(blockedRentals, rentalsWithPrevious),
    currentProblems,
    problemsSolved,
    solveEfficiency: percentage(problemsSolved, blockedRentals),
    availabilityImpact: percentage(blockedRentals, totalRentals),
  };
}

/**
 * One row per threshold, in the order given. The delay lookup is built once
 * for the whole sweep.
 */
export function createThresholdSweep(
  rentals: readonly RentalRecord[],
  thresholds: readonly number[],
  scope: RentalScope = "all",
): ThresholdSweepRow[] {
  const lookup = buildPreviousDelayLookup(rentals);

  return thresholds.map((threshold) => ({
    threshold,
    ...calculateThresholdImpact(rentals, threshold, scope, lookup),
  }));
}

/** Inclusive evenly spaced thresholds; empty when `from > to`. */
export function buildThresholdRange(
  from = DEFAULT_SWEEP_FROM_MINUTES,
  to = DEFAULT_SWEEP_TO_MINUTES,
  step = DEFAULT_SWEEP_STEP_MINUTES,
): number[] {
  if (step <= 0) {
    throw new RangeError(`Threshold step must be positive, got ${step}`);
  }

  const thresholds: number[] = [];
  for (let threshold = from; threshold <= to; threshold += step) {
    thresholds.push(threshold);
  }
  return thresholds;
}
