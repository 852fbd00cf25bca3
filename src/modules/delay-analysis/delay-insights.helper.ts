import { CHECKIN_TYPE_MOBILE, RENTAL_STATE_CANCELED } from "../../config/constants";
import type { RentalRecord } from "../rental-dataset/rental-dataset.interface";
import {
  CONNECT_MIN_COVERAGE_RATIO,
  DEFAULT_GAP_BIN_MINUTES,
  GAP_DISTRIBUTION_MAX_MINUTES,
  RECOMMENDED_THRESHOLD_MINUTES,
} from "./delay-analysis.const";
import type {
  CancellationImpact,
  DatasetSummary,
  GapBin,
  HandoverObservation,
  LateReturnAnalysis,
  ProblemScope,
  ReturnStatusDistribution,
  ScopeComparison,
  ScopeRecommendation,
} from "./delay-analysis.interface";
import {
  buildPreviousDelayLookup,
  calculateThresholdImpact,
  createThresholdSweep,
  hasPreviousRental,
  isConnectRental,
  observeHandover,
  percentage,
} from "./delay-impact.helper";

function isCanceled(rental: RentalRecord): boolean {
  return rental.state === RENTAL_STATE_CANCELED;
}

function average(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function countBy(
  rentals: readonly RentalRecord[],
  key: (rental: RentalRecord) => string,
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const rental of rentals) {
    const value = key(rental);
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

/** Handover observations for every rental that follows another one. */
export function observeHandovers(rentals: readonly RentalRecord[]): HandoverObservation[] {
  const lookup = buildPreviousDelayLookup(rentals);
  return rentals.filter(hasPreviousRental).map((rental) => observeHandover(rental, lookup));
}

export function summarizeDataset(rentals: readonly RentalRecord[]): DatasetSummary {
  return {
    totalRentals: rentals.length,
    connectRentals: rentals.filter(isConnectRental).length,
    mobileRentals: rentals.filter(
      (rental) => rental.checkinType.toLowerCase() === CHECKIN_TYPE_MOBILE,
    ).length,
    canceledRentals: rentals.filter(isCanceled).length,
    rentalsWithPrevious: rentals.filter(hasPreviousRental).length,
    byCheckinType: countBy(rentals, (rental) => rental.checkinType),
    byState: countBy(rentals, (rental) => rental.state),
  };
}

export function analyseProblemScope(rentals: readonly RentalRecord[]): ProblemScope {
  const handovers = observeHandovers(rentals);
  const problems = handovers.filter((handover) => handover.causesProblem);

  return {
    rentalsWithPrevious: handovers.length,
    problemCases: problems.length,
    problemRate: percentage(problems.length, handovers.length),
    averageWaitTimeInMinutes: average(problems.map((problem) => problem.waitTimeInMinutes)) ?? 0,
    resultingCancellations: problems.filter((problem) => isCanceled(problem.rental)).length,
  };
}

/**
 * The late return rate is measured against handovers whose predecessor delay
 * is known, while the impact rate uses every handover.
 */
export function analyseLateReturns(rentals: readonly RentalRecord[]): LateReturnAnalysis {
  const handovers = observeHandovers(rentals);
  const withDelayData = handovers.filter((handover) => handover.previousDelayInMinutes !== null);
  const lateDelays = withDelayData
    .map((handover) => handover.previousDelayInMinutes ?? 0)
    .filter((delay) => delay > 0);
  const impacted = handovers.filter((handover) => handover.causesProblem);

  return {
    rentalsWithDelayData: withDelayData.length,
    lateReturns: lateDelays.length,
    lateReturnRate: percentage(lateDelays.length, withDelayData.length),
    averageLateDelayInMinutes: average(lateDelays),
    impactedNextDrivers: impacted.length,
    impactRate: percentage(impacted.length, handovers.length),
    averageWaitTimeInMinutes: average(impacted.map((handover) => handover.waitTimeInMinutes)),
    lateToImpactRatio: percentage(impacted.length, lateDelays.length),
  };
}

/** Uses each rental's own checkout delay, unclamped. */
export function summarizeReturnStatus(rentals: readonly RentalRecord[]): ReturnStatusDistribution {
  const distribution: ReturnStatusDistribution = { early: 0, onTime: 0, late: 0 };

  for (const { delayAtCheckoutInMinutes: delay } of rentals) {
    if (delay === null) {
      continue;
    }
    if (delay < 0) {
      distribution.early += 1;
    } else if (delay === 0) {
      distribution.onTime += 1;
    } else {
      distribution.late += 1;
    }
  }

  return distribution;
}

/**
 * Histogram of gaps between consecutive rentals within
 * [0, GAP_DISTRIBUTION_MAX_MINUTES]. The last bin is closed on the right.
 */
export function buildGapDistribution(
  rentals: readonly RentalRecord[],
  binMinutes = DEFAULT_GAP_BIN_MINUTES,
  maxMinutes = GAP_DISTRIBUTION_MAX_MINUTES,
): GapBin[] {
  if (binMinutes <= 0) {
    throw new RangeError(`Gap bin size must be positive, got ${binMinutes}`);
  }

  const binCount = Math.max(1, Math.ceil(maxMinutes / binMinutes));
  const bins: GapBin[] = Array.from({ length: binCount }, (_, index) => ({
    fromMinutes: index * binMinutes,
    toMinutes: Math.min((index + 1) * binMinutes, maxMinutes),
    count: 0,
  }));

  for (const rental of rentals) {
    const gap = rental.timeDeltaWithPreviousRentalInMinutes;
    if (!hasPreviousRental(rental) || gap === null || gap < 0 || gap > maxMinutes) {
      continue;
    }
    const bin = bins[Math.min(Math.floor(gap / binMinutes), binCount - 1)];
    if (bin) {
      bin.count += 1;
    }
  }

  return bins;
}

export function analyseCancellations(rentals: readonly RentalRecord[]): CancellationImpact {
  const totalCancellations = rentals.filter(isCanceled).length;
  const delayRelatedCancellations = observeHandovers(rentals).filter(
    (handover) => handover.causesProblem && isCanceled(handover.rental),
  ).length;

  const totals = countBy(rentals, (rental) => rental.checkinType);
  const canceled = countBy(rentals.filter(isCanceled), (rental) => rental.checkinType);
  const cancellationRateByCheckinType: Record<string, number> = {};
  for (const [checkinType, total] of Object.entries(totals)) {
    const rate = percentage(canceled[checkinType] ?? 0, total);
    cancellationRateByCheckinType[checkinType] = Math.round(rate * 10) / 10;
  }

  return {
    totalCancellations,
    delayRelatedCancellations,
    delayRelatedPercentage: percentage(delayRelatedCancellations, totalCancellations),
    cancellationRateByCheckinType,
  };
}

/**
 * Side-by-side results for both scopes. The sweep series expresses problems
 * solved as a share of each scope's current problems so the two curves are
 * comparable.
 */
export function compareScopes(
  rentals: readonly RentalRecord[],
  thresholdMinutes: number,
  thresholds: readonly number[],
): ScopeComparison {
  const lookup = buildPreviousDelayLookup(rentals);
  const allSweep = createThresholdSweep(rentals, thresholds, "all");
  const connectSweep = createThresholdSweep(rentals, thresholds, "connect");

  return {
    threshold: thresholdMinutes,
    all: calculateThresholdImpact(rentals, thresholdMinutes, "all", lookup),
    connect: calculateThresholdImpact(rentals, thresholdMinutes, "connect", lookup),
    sweep: allSweep.map((allRow, index) => {
      const connectRow = connectSweep[index];
      return {
        threshold: allRow.threshold,
        allProblemsSolvedPercentage: percentage(allRow.problemsSolved, allRow.currentProblems),
        connectProblemsSolvedPercentage: connectRow
          ? percentage(connectRow.problemsSolved, connectRow.currentProblems)
          : 0,
      };
    }),
  };
}

/**
 * Restricting the buffer to connect cars is recommended only when it is
 * strictly more efficient and still solves at least 70% of the problems the
 * all-cars rule would.
 */
export function recommendScope(
  rentals: readonly RentalRecord[],
  thresholdMinutes = RECOMMENDED_THRESHOLD_MINUTES,
): ScopeRecommendation {
  const lookup = buildPreviousDelayLookup(rentals);
  const all = calculateThresholdImpact(rentals, thresholdMinutes, "all", lookup);
  const connect = calculateThresholdImpact(rentals, thresholdMinutes, "connect", lookup);

  const connectPreferred =
    connect.solveEfficiency > all.solveEfficiency &&
    connect.problemsSolved >= all.problemsSolved * CONNECT_MIN_COVERAGE_RATIO;

  return {
    threshold: thresholdMinutes,
    scope: connectPreferred ? "connect" : "all",
    all,
    connect,
  };
}
