import { z } from "zod";

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),

  RENTALS_DATA_PATH: z.string().trim().min(1, "RENTALS_DATA_PATH must not be empty").optional(),
  RENTALS_PRELOAD: z.stringbool().default(true),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = z.flattenError(result.error).fieldErrors;
    console.error("❌ Environment validation failed:");

    for (const [field, messages] of Object.entries(errors)) {
      console.error(`  ${field}: ${messages?.join(", ")}`);
    }

    throw new Error("Invalid environment configuration. Please check your .env file.");
  }

  return result.data;
}
