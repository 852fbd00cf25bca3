import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { validateEnvironment } from "./config/env.config";
import { DelayAnalysisModule } from "./modules/delay-analysis/delay-analysis.module";
import { HealthModule } from "./modules/health/health.module";
import { RentalDatasetModule } from "./modules/rental-dataset/rental-dataset.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    RentalDatasetModule,
    DelayAnalysisModule,
    HealthModule,
  ],
})
export class AppModule {}
