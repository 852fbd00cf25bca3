import type { PipeTransform } from "@nestjs/common";
import type { z } from "zod";
import { ValidationException } from "../errors/app.exception";
import type { FieldError } from "../errors/problem-details.interface";

export const ROOT_FIELD_ERROR = "_root";

type IssueLike = { path: PropertyKey[]; code?: string; message: string };

/**
 * Flattens zod issues into field errors. `prefix` is prepended to every
 * path, e.g. "rows.4" when validating one spreadsheet row.
 */
export function mapZodIssuesToFieldErrors(issues: IssueLike[], prefix?: string): FieldError[] {
  return issues.map((issue) => {
    const path = issue.path.map(String);
    const segments = prefix ? [prefix, ...path] : path;

    return {
      field: segments.length > 0 ? segments.join(".") : ROOT_FIELD_ERROR,
      code: issue.code,
      message: issue.message,
    };
  });
}

export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: z.ZodType<T>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      throw new ValidationException(mapZodIssuesToFieldErrors(result.error.issues));
    }

    return result.data;
  }
}
