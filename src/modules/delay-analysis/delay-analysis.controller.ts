import { Controller, Get, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { DelayAnalysisService } from "./delay-analysis.service";
import {
  type GapDistributionQueryDto,
  gapDistributionQuerySchema,
  type ScopeComparisonQueryDto,
  scopeComparisonQuerySchema,
  type ThresholdImpactQueryDto,
  type ThresholdSweepQueryDto,
  thresholdImpactQuerySchema,
  thresholdSweepQuerySchema,
} from "./dto/delay-analysis.dto";

@Controller("api/delay-analysis")
export class DelayAnalysisController {
  constructor(private readonly delayAnalysisService: DelayAnalysisService) {}

  @Get("summary")
  async getSummary() {
    return this.delayAnalysisService.getSummary();
  }

  @Get("problems")
  async getProblemScope() {
    return this.delayAnalysisService.getProblemScope();
  }

  @Get("late-returns")
  async getLateReturns() {
    return this.delayAnalysisService.getLateReturns();
  }

  @Get("return-status")
  async getReturnStatus() {
    return this.delayAnalysisService.getReturnStatus();
  }

  @Get("gaps")
  async getGapDistribution(
    @ZodQuery(gapDistributionQuerySchema) query: GapDistributionQueryDto,
  ) {
    return this.delayAnalysisService.getGapDistribution(query);
  }

  @Get("cancellations")
  async getCancellations() {
    return this.delayAnalysisService.getCancellations();
  }

  @Get("impact")
  async getThresholdImpact(
    @ZodQuery(thresholdImpactQuerySchema) query: ThresholdImpactQueryDto,
  ) {
    return this.delayAnalysisService.getThresholdImpact(query);
  }

  @Get("sweep")
  async getThresholdSweep(@ZodQuery(thresholdSweepQuerySchema) query: ThresholdSweepQueryDto) {
    return this.delayAnalysisService.getThresholdSweep(query);
  }

  @Get("scope-comparison")
  async getScopeComparison(
    @ZodQuery(scopeComparisonQuerySchema) query: ScopeComparisonQueryDto,
  ) {
    return this.delayAnalysisService.getScopeComparison(query);
  }

  @Get("recommendation")
  async getRecommendation() {
    return this.delayAnalysisService.getRecommendation();
  }

  @Post("reload")
  @HttpCode(HttpStatus.OK)
  async reload() {
    return this.delayAnalysisService.reload();
  }
}
