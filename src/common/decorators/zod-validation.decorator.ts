import { Query } from "@nestjs/common";
import type { z } from "zod";
import { ZodValidationPipe } from "../pipes/zod-validation.pipe";

export function ZodQuery<T>(schema: z.ZodType<T>): ParameterDecorator {
  return Query(new ZodValidationPipe(schema));
}
