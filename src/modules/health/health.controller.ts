import { Controller, Get } from "@nestjs/common";
import { HealthCheck, type HealthCheckResult } from "@nestjs/terminus";
import type { RentalDatasetStatus } from "../rental-dataset/rental-dataset.interface";
import { HealthService } from "./health.service";

@Controller("health")
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /** Terminus check; loads the rental dataset if it is not loaded yet. */
  @Get()
  @HealthCheck()
  checkHealth(): Promise<HealthCheckResult> {
    return this.healthService.checkHealth();
  }

  /** Where the rental dataset load stands, without starting one. */
  @Get("dataset")
  getDatasetStatus(): RentalDatasetStatus {
    return this.healthService.getDatasetStatus();
  }
}
