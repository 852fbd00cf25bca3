import { Injectable, Logger } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";
import type { RentalRecord } from "../rental-dataset/rental-dataset.interface";
import { RentalDatasetService } from "../rental-dataset/rental-dataset.service";
import { MAX_SWEEP_POINTS } from "./delay-analysis.const";
import { DelayAnalysisFailedException, DelayAnalysisValidationException } from "./delay-analysis.error";
import type {
  CancellationImpact,
  DatasetSummary,
  GapBin,
  LateReturnAnalysis,
  ProblemScope,
  ReturnStatusDistribution,
  ScopeComparison,
  ScopeRecommendation,
  ThresholdImpact,
  ThresholdSweepRow,
} from "./delay-analysis.interface";
import { buildThresholdRange, calculateThresholdImpact, createThresholdSweep } from "./delay-impact.helper";
import {
  analyseCancellations,
  analyseLateReturns,
  analyseProblemScope,
  buildGapDistribution,
  compareScopes,
  recommendScope,
  summarizeDataset,
  summarizeReturnStatus,
} from "./delay-insights.helper";
import type {
  GapDistributionQueryDto,
  ScopeComparisonQueryDto,
  ThresholdImpactQueryDto,
  ThresholdSelection,
  ThresholdSweepQueryDto,
} from "./dto/delay-analysis.dto";

@Injectable()
export class DelayAnalysisService {
  private readonly logger = new Logger(DelayAnalysisService.name);

  constructor(private readonly rentalDatasetService: RentalDatasetService) {}

  getSummary(): Promise<DatasetSummary> {
    return this.analyse("dataset summary", summarizeDataset);
  }

  getProblemScope(): Promise<ProblemScope> {
    return this.analyse("problem scope", analyseProblemScope);
  }

  getLateReturns(): Promise<LateReturnAnalysis> {
    return this.analyse("late returns", analyseLateReturns);
  }

  getReturnStatus(): Promise<ReturnStatusDistribution> {
    return this.analyse("return status", summarizeReturnStatus);
  }

  getGapDistribution(query: GapDistributionQueryDto): Promise<GapBin[]> {
    return this.analyse("gap distribution", (rentals) =>
      buildGapDistribution(rentals, query.binSize),
    );
  }

  getCancellations(): Promise<CancellationImpact> {
    return this.analyse("cancellation impact", analyseCancellations);
  }

  getThresholdImpact(query: ThresholdImpactQueryDto): Promise<ThresholdImpact> {
    return this.analyse("threshold impact", (rentals) =>
      calculateThresholdImpact(rentals, query.threshold, query.scope),
    );
  }

  async getThresholdSweep(query: ThresholdSweepQueryDto): Promise<ThresholdSweepRow[]> {
    const thresholds = this.resolveThresholds(query);
    return this.analyse("threshold sweep", (rentals) =>
      createThresholdSweep(rentals, thresholds, query.scope),
    );
  }

  async getScopeComparison(query: ScopeComparisonQueryDto): Promise<ScopeComparison> {
    const thresholds = this.resolveThresholds(query);
    return this.analyse("scope comparison", (rentals) =>
      compareScopes(rentals, query.threshold, thresholds),
    );
  }

  getRecommendation(): Promise<ScopeRecommendation> {
    return this.analyse("scope recommendation", (rentals) => recommendScope(rentals));
  }

  async reload(): Promise<DatasetSummary> {
    try {
      const dataset = await this.rentalDatasetService.reload();
      return summarizeDataset(dataset.records);
    } catch (error) {
      if (error instanceof AppException) {
        throw error;
      }
      this.logger.error("Failed to reload rental dataset", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DelayAnalysisFailedException();
    }
  }

  private resolveThresholds(selection: ThresholdSelection): number[] {
    if (selection.thresholds) {
      return selection.thresholds;
    }

    const { from, to, step } = selection;
    if (from > to) {
      throw new DelayAnalysisValidationException("from must not be greater than to");
    }

    const points = Math.floor((to - from) / step) + 1;
    if (points > MAX_SWEEP_POINTS) {
      throw new DelayAnalysisValidationException(
        `Sweep would evaluate ${points} thresholds; at most ${MAX_SWEEP_POINTS} are allowed`,
      );
    }

    return buildThresholdRange(from, to, step);
  }

  private async analyse<T>(
    name: string,
    compute: (rentals: readonly RentalRecord[]) => T,
  ): Promise<T> {
    try {
      const dataset = await this.rentalDatasetService.getDataset();
      return compute(dataset.records);
    } catch (error) {
      if (error instanceof AppException) {
        throw error;
      }
      this.logger.error(`Failed to compute ${name}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DelayAnalysisFailedException();
    }
  }
}
