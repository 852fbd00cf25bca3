import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { validateEnvironment } from "../config/env.config";
import { DelayAnalysisModule } from "../modules/delay-analysis/delay-analysis.module";
import { DelaySweepCommand } from "./delay-sweep.command";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    DelayAnalysisModule,
  ],
  providers: [DelaySweepCommand],
})
export class CommandsModule {}
