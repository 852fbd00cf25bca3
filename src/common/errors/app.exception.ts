import { HttpException, HttpStatus } from "@nestjs/common";
import type { FieldError } from "./problem-details.interface";

export interface AppExceptionOptions {
  title?: string;
  errors?: FieldError[];
  details?: Record<string, unknown>;
}

/**
 * Base exception class for all application-specific errors.
 *
 * The response body follows RFC 7807 (type, title, status, detail) and also
 * carries a machine-readable `errorCode`. Field-level validation errors stay
 * at the top level under `errors`.
 *
 * Each module defines its own error codes (e.g. RentalDatasetErrorCode,
 * DelayAnalysisErrorCode) next to its domain logic.
 */
export class AppException extends HttpException {
  constructor(
    public readonly errorCode: string,
    message: string,
    status: HttpStatus,
    private readonly problem: AppExceptionOptions = {},
  ) {
    super(
      {
        type: errorCode,
        title: problem.title ?? errorCode,
        status,
        detail: message,
        errorCode,
        ...(problem.errors && { errors: problem.errors }),
        ...(problem.details && { details: problem.details }),
      },
      status,
    );
    this.message = message;
  }

  getErrorCode(): string {
    return this.errorCode;
  }

  getFieldErrors(): FieldError[] | undefined {
    return this.problem.errors;
  }

  getDetails(): Record<string, unknown> | undefined {
    return this.problem.details;
  }
}

/**
 * Raised when a request or an input document fails schema validation.
 */
export class ValidationException extends AppException {
  constructor(errors: FieldError[], message = "One or more validation errors occurred") {
    super("VALIDATION_ERROR", message, HttpStatus.BAD_REQUEST, {
      title: "Validation Failed",
      errors,
    });
  }
}
