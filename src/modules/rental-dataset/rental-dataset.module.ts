import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { DEFAULT_DATASET_PATHS } from "../../config/constants";
import type { EnvConfig } from "../../config/env.config";
import { RENTAL_DATASET_OPTIONS } from "./rental-dataset.const";
import type { RentalDatasetOptions } from "./rental-dataset.interface";
import { RentalDatasetService } from "./rental-dataset.service";

@Module({
  providers: [
    {
      provide: RENTAL_DATASET_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvConfig>): RentalDatasetOptions => ({
        dataPath: configService.get("RENTALS_DATA_PATH", { infer: true }),
        candidatePaths: DEFAULT_DATASET_PATHS,
        preload: configService.get("RENTALS_PRELOAD", { infer: true }) ?? true,
      }),
    },
    RentalDatasetService,
  ],
  exports: [RentalDatasetService],
})
export class RentalDatasetModule {}
