import { Module } from "@nestjs/common";
import { TerminusModule } from "@nestjs/terminus";
import { RentalDatasetModule } from "../rental-dataset/rental-dataset.module";
import { HealthController } from "./health.controller";
import { HealthService } from "./health.service";
import { RentalDatasetHealthIndicator } from "./indicators/rental-dataset.health";

@Module({
  imports: [TerminusModule, RentalDatasetModule],
  controllers: [HealthController],
  providers: [HealthService, RentalDatasetHealthIndicator],
})
export class HealthModule {}
