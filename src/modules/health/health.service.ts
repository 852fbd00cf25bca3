import { Injectable } from "@nestjs/common";
import { HealthCheckResult, HealthCheckService } from "@nestjs/terminus";
import type { RentalDatasetStatus } from "../rental-dataset/rental-dataset.interface";
import { RentalDatasetService } from "../rental-dataset/rental-dataset.service";
import { RentalDatasetHealthIndicator } from "./indicators/rental-dataset.health";

@Injectable()
export class HealthService {
  constructor(
    private readonly healthCheckService: HealthCheckService,
    private readonly rentalDatasetHealth: RentalDatasetHealthIndicator,
    private readonly rentalDatasetService: RentalDatasetService,
  ) {}

  async checkHealth(): Promise<HealthCheckResult> {
    return this.healthCheckService.check([
      () => this.rentalDatasetHealth.isHealthy("rentalDataset"),
    ]);
  }

  getDatasetStatus(): RentalDatasetStatus {
    return this.rentalDatasetService.getStatus();
  }
}
