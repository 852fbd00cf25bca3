/**
 * RFC 7807 Problem Details interface for structured error responses.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7807
 */
export interface ProblemDetails {
  /**
   * Identifies the problem type.
   * Example: "VALIDATION_ERROR", "RENTAL_DATASET_NOT_FOUND"
   */
  type: string;

  /**
   * A short, human-readable summary of the problem type.
   */
  title: string;

  /**
   * The HTTP status code for this occurrence of the problem.
   */
  status: number;

  /**
   * A human-readable explanation specific to this occurrence of the problem.
   */
  detail: string;

  /**
   * The request path that produced the problem.
   */
  instance?: string;
}

/**
 * Problem details as returned by the API, with the optional extensions
 * the application adds on top of RFC 7807.
 */
export interface ApplicationProblemDetails extends ProblemDetails {
  errorCode?: string;
  errors?: FieldError[];
  details?: Record<string, unknown>;
}

/**
 * Individual field validation error.
 */
export interface FieldError {
  /**
   * The field that has the error, in dot notation: "rows.4.rental_id"
   */
  field: string;

  /**
   * Machine-readable error code, e.g. "invalid_type", "missing_column".
   */
  code?: string;

  message: string;
}
