import { Injectable, Logger } from "@nestjs/common";
import { type HealthIndicatorResult, HealthIndicatorService } from "@nestjs/terminus";
import { RentalDatasetService } from "../../rental-dataset/rental-dataset.service";

@Injectable()
export class RentalDatasetHealthIndicator {
  private readonly logger = new Logger(RentalDatasetHealthIndicator.name);

  constructor(
    private readonly rentalDatasetService: RentalDatasetService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /** Loads the dataset when it is not loaded yet, so a failed preload is retried here. */
  async isHealthy<Key extends string>(key: Key): Promise<HealthIndicatorResult<Key>> {
    const indicator = this.healthIndicatorService.check(key);
    try {
      const dataset = await this.rentalDatasetService.getDataset();

      return indicator.up({ source: dataset.source, rowCount: dataset.records.length });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      this.logger.warn(`Rental dataset health check failed: ${message}`);
      return indicator.down({ message });
    }
  }
}
