import type { RentalRecord } from "../rental-dataset/rental-dataset.interface";
import type { RENTAL_SCOPE_VALUES } from "./delay-analysis.const";

export type RentalScope = (typeof RENTAL_SCOPE_VALUES)[number];

/** rental_id → clamped checkout delay (null when checkout was not observed). */
export type PreviousDelayLookup = ReadonlyMap<number, number | null>;

/**
 * What happened at the handover from the previous rental of the same car,
 * independent of any buffer policy.
 */
export interface HandoverObservation {
  rental: RentalRecord;
  gapInMinutes: number | null;
  /** The predecessor's clamped checkout delay. */
  previousDelayInMinutes: number | null;
  /** The predecessor came back later than the planned gap allowed. */
  causesProblem: boolean;
  waitTimeInMinutes: number;
}

export interface HandoverEvaluation extends HandoverObservation {
  wouldBeBlocked: boolean;
  problemSolved: boolean;
}

/** Percentages are in [0, 100]. */
export interface ThresholdImpact {
  totalRentals: number;
  rentalsWithPrevious: number;
  blockedRentals: number;
  blockedPercentage: number;
  currentProblems: number;
  problemsSolved: number;
  solveEfficiency: number;
  availabilityImpact: number;
}

export interface ThresholdSweepRow extends ThresholdImpact {
  threshold: number;
}

export interface DatasetSummary {
  totalRentals: number;
  connectRentals: number;
  mobileRentals: number;
  canceledRentals: number;
  rentalsWithPrevious: number;
  byCheckinType: Record<string, number>;
  byState: Record<string, number>;
}

export interface ProblemScope {
  rentalsWithPrevious: number;
  problemCases: number;
  problemRate: number;
  averageWaitTimeInMinutes: number;
  resultingCancellations: number;
}

export interface LateReturnAnalysis {
  rentalsWithDelayData: number;
  lateReturns: number;
  lateReturnRate: number;
  averageLateDelayInMinutes: number | null;
  impactedNextDrivers: number;
  impactRate: number;
  averageWaitTimeInMinutes: number | null;
  lateToImpactRatio: number;
}

export interface ReturnStatusDistribution {
  early: number;
  onTime: number;
  late: number;
}

export interface GapBin {
  fromMinutes: number;
  toMinutes: number;
  count: number;
}

export interface CancellationImpact {
  totalCancellations: number;
  delayRelatedCancellations: number;
  delayRelatedPercentage: number;
  cancellationRateByCheckinType: Record<string, number>;
}

export interface ScopeSweepPoint {
  threshold: number;
  allProblemsSolvedPercentage: number;
  connectProblemsSolvedPercentage: number;
}

export interface ScopeComparison {
  threshold: number;
  all: ThresholdImpact;
  connect: ThresholdImpact;
  sweep: ScopeSweepPoint[];
}

export interface ScopeRecommendation {
  threshold: number;
  scope: RentalScope;
  all: ThresholdImpact;
  connect: ThresholdImpact;
}
