import { Module } from "@nestjs/common";
import { RentalDatasetModule } from "../rental-dataset/rental-dataset.module";
import { DelayAnalysisController } from "./delay-analysis.controller";
import { DelayAnalysisService } from "./delay-analysis.service";

@Module({
  imports: [RentalDatasetModule],
  controllers: [DelayAnalysisController],
  providers: [DelayAnalysisService],
  exports: [DelayAnalysisService],
})
export class DelayAnalysisModule {}
