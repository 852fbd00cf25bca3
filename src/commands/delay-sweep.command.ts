import { Injectable, Logger } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import {
  DEFAULT_SWEEP_FROM_MINUTES,
  DEFAULT_SWEEP_STEP_MINUTES,
  DEFAULT_SWEEP_TO_MINUTES,
  DEFAULT_THRESHOLD_MINUTES,
  RENTAL_SCOPE_VALUES,
} from "../modules/delay-analysis/delay-analysis.const";
import type {
  RentalScope,
  ThresholdImpact,
  ThresholdSweepRow,
} from "../modules/delay-analysis/delay-analysis.interface";
import { DelayAnalysisService } from "../modules/delay-analysis/delay-analysis.service";

interface CliOptions {
  scope?: RentalScope;
  from?: number;
  to?: number;
  step?: number;
  threshold?: number;
}

const SWEEP_COLUMNS = ["threshold", "blocked", "blocked %", "solved", "efficiency %", "availability %"];

function isRentalScope(value: string): value is RentalScope {
  return RENTAL_SCOPE_VALUES.some((scope) => scope === value);
}

function formatPercent(value: number): string {
  return value.toFixed(1);
}

export function formatSweepTable(rows: readonly ThresholdSweepRow[]): string[] {
  const cells = rows.map((row) => [
    String(row.threshold),
    String(row.blockedRentals),
    formatPercent(row.blockedPercentage),
    `${row.problemsSolved}/${row.currentProblems}`,
    formatPercent(row.solveEfficiency),
    formatPercent(row.availabilityImpact),
  ]);
  const widths = SWEEP_COLUMNS.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index]?.length ?? 0)),
  );
  const render = (line: readonly string[]) =>
    line.map((cell, index) => cell.padStart(widths[index] ?? 0)).join("  ");

  return [render(SWEEP_COLUMNS), ...cells.map(render)];
}

function describeImpact(impact: ThresholdImpact): string {
  return (
    `blocks ${impact.blockedRentals}/${impact.rentalsWithPrevious} consecutive rentals ` +
    `(${formatPercent(impact.blockedPercentage)}%), solves ${impact.problemsSolved}/${impact.currentProblems} problems, ` +
    `efficiency ${formatPercent(impact.solveEfficiency)}%, availability impact ${formatPercent(impact.availabilityImpact)}%`
  );
}

@Injectable()
@Command({
  name: "delay:sweep",
  description: "Print the cost and benefit of minimum-gap thresholds between rentals",
})
export class DelaySweepCommand extends CommandRunner {
  private readonly logger = new Logger(DelaySweepCommand.name);

  constructor(private readonly delayAnalysisService: DelayAnalysisService) {
    super();
  }

  async run(_inputs: string[], options: CliOptions): Promise<void> {
    const scope = options.scope ?? "all";
    const threshold = options.threshold ?? DEFAULT_THRESHOLD_MINUTES;

    const impact = await this.delayAnalysisService.getThresholdImpact({ threshold, scope });
    this.logger.log(`Threshold ${threshold} min, scope ${scope}: ${describeImpact(impact)}`);

    const rows = await this.delayAnalysisService.getThresholdSweep({
      from: options.from ?? DEFAULT_SWEEP_FROM_MINUTES,
      to: options.to ?? DEFAULT_SWEEP_TO_MINUTES,
      step: options.step ?? DEFAULT_SWEEP_STEP_MINUTES,
      scope,
    });
    for (const line of formatSweepTable(rows)) {
      this.logger.log(line);
    }

    const recommendation = await this.delayAnalysisService.getRecommendation();
    this.logger.log(
      `Recommendation at ${recommendation.threshold} min: apply the buffer to ${
        recommendation.scope === "connect" ? "connect cars only" : "all cars"
      }`,
    );
  }

  @Option({
    flags: "--scope [scope]",
    description: "Rentals the buffer applies to: all or connect (default: all)",
  })
  parseScope(value: string): RentalScope {
    const scope = value.trim().toLowerCase();
    if (!isRentalScope(scope)) {
      throw new Error(`--scope must be one of ${RENTAL_SCOPE_VALUES.join(", ")}, got "${value}"`);
    }
    return scope;
  }

  @Option({
    flags: "--threshold [minutes]",
    description: `Threshold to detail (default: ${DEFAULT_THRESHOLD_MINUTES})`,
  })
  parseThreshold(value: string): number {
    return this.parseMinutes("--threshold", value);
  }

  @Option({
    flags: "--from [minutes]",
    description: `First threshold of the sweep (default: ${DEFAULT_SWEEP_FROM_MINUTES})`,
  })
  parseFrom(value: string): number {
    return this.parseMinutes("--from", value);
  }

  @Option({
    flags: "--to [minutes]",
    description: `Last threshold of the sweep (default: ${DEFAULT_SWEEP_TO_MINUTES})`,
  })
  parseTo(value: string): number {
    return this.parseMinutes("--to", value);
  }

  @Option({
    flags: "--step [minutes]",
    description: `Sweep step (default: ${DEFAULT_SWEEP_STEP_MINUTES})`,
  })
  parseStep(value: string): number {
    const step = this.parseMinutes("--step", value);
    if (step === 0) {
      throw new Error("--step must be at least 1");
    }
    return step;
  }

  private parseMinutes(flag: string, value: string): number {
    if (!/^\d+$/.test(value.trim())) {
      throw new Error(`${flag} must be a whole number of minutes, got "${value}"`);
    }
    return Number(value.trim());
  }
}
