import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const DelayAnalysisErrorCode = {
  DELAY_ANALYSIS_FAILED: "DELAY_ANALYSIS_FAILED",
  DELAY_ANALYSIS_VALIDATION_ERROR: "DELAY_ANALYSIS_VALIDATION_ERROR",
} as const;

export class DelayAnalysisException extends AppException {}

export class DelayAnalysisFailedException extends DelayAnalysisException {
  constructor() {
    super(
      DelayAnalysisErrorCode.DELAY_ANALYSIS_FAILED,
      "An unexpected error occurred while analysing rental delays",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Delay Analysis Failed" },
    );
  }
}

export class DelayAnalysisValidationException extends DelayAnalysisException {
  constructor(detail: string) {
    super(DelayAnalysisErrorCode.DELAY_ANALYSIS_VALIDATION_ERROR, detail, HttpStatus.BAD_REQUEST, {
      title: "Delay Analysis Validation Failed",
    });
  }
}
