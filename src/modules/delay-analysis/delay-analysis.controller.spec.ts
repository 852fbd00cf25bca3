import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { DelayAnalysisController } from "./delay-analysis.controller";
import { DelayAnalysisService } from "./delay-analysis.service";

describe("DelayAnalysisController", () => {
  let controller: DelayAnalysisController;
  let delayAnalysisService: {
    getSummary: ReturnType<typeof vi.fn>;
    getGapDistribution: ReturnType<typeof vi.fn>;
    getThresholdImpact: ReturnType<typeof vi.fn>;
    getThresholdSweep: ReturnType<typeof vi.fn>;
    getScopeComparison: ReturnType<typeof vi.fn>;
    reload: ReturnType<typeof vi.fn>;
  };

  beforeEach(async () => {
    delayAnalysisService = {
      getSummary: vi.fn(),
      getGapDistribution: vi.fn(),
      getThresholdImpact: vi.fn(),
      getThresholdSweep: vi.fn(),
      getScopeComparison: vi.fn(),
      reload: vi.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DelayAnalysisController],
      providers: [{ provide: DelayAnalysisService, useValue: delayAnalysisService }],
    }).compile();

    controller = module.get<DelayAnalysisController>(DelayAnalysisController);
  });

  it("should delegate summary to the service", async () => {
    const mockResult = { totalRentals: 3 };
    delayAnalysisService.getSummary.mockResolvedValue(mockResult);

    const result = await controller.getSummary();

    expect(result).toEqual(mockResult);
    expect(delayAnalysisService.getSummary).toHaveBeenCalledOnce();
  });

  it("should delegate threshold impact with the parsed query", async () => {
    const query = { threshold: 60, scope: "connect" as const };
    delayAnalysisService.getThresholdImpact.mockResolvedValue({ blockedRentals: 1 });

    const result = await controller.getThresholdImpact(query);

    expect(result).toEqual({ blockedRentals: 1 });
    expect(delayAnalysisService.getThresholdImpact).toHaveBeenCalledWith(query);
  });

  it("should delegate the sweep with the parsed query", async () => {
    const query = { from: 0, to: 60, step: 30, scope: "all" as const };
    delayAnalysisService.getThresholdSweep.mockResolvedValue([]);

    await controller.getThresholdSweep(query);

    expect(delayAnalysisService.getThresholdSweep).toHaveBeenCalledWith(query);
  });

  it("should delegate scope comparison with the parsed query", async () => {
    const query = { threshold: 90, from: 0, to: 300, step: 30 };
    delayAnalysisService.getScopeComparison.mockResolvedValue({ threshold: 90 });

    await controller.getScopeComparison(query);

    expect(delayAnalysisService.getScopeComparison).toHaveBeenCalledWith(query);
  });

  it("should delegate gap distribution with the bin size", async () => {
    delayAnalysisService.getGapDistribution.mockResolvedValue([]);

    await controller.getGapDistribution({ binSize: 30 });

    expect(delayAnalysisService.getGapDistribution).toHaveBeenCalledWith({ binSize: 30 });
  });

  it("should reload the dataset", async () => {
    delayAnalysisService.reload.mockResolvedValue({ totalRentals: 8 });

    const result = await controller.reload();

    expect(result).toEqual({ totalRentals: 8 });
  });
});
