import { z } from "zod";
import type { RentalRecord } from "./rental-dataset.interface";

/**
 * Spreadsheet cells arrive as numbers, strings or null. Blank strings are
 * missing values; anything else is read as a number and must parse.
 */
function toNullableNumber(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : Number(trimmed);
  }

  return value;
}

const minutesSchema = z.preprocess(toNullableNumber, z.number().nullable());
const optionalIdSchema = z.preprocess(toNullableNumber, z.number().int().nullable());
const idSchema = z.preprocess(toNullableNumber, z.number().int());
const labelSchema = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z.string().trim().min(1),
);

export const rentalRowSchema = z
  .object({
    rental_id: idSchema,
    car_id: optionalIdSchema,
    checkin_type: labelSchema,
    state: labelSchema,
    delay_at_checkout_in_minutes: minutesSchema,
    previous_ended_rental_id: optionalIdSchema,
    time_delta_with_previous_rental_in_minutes: minutesSchema,
  })
  .transform(
    (row): RentalRecord => ({
      rentalId: row.rental_id,
      carId: row.car_id,
      checkinType: row.checkin_type,
      state: row.state,
      delayAtCheckoutInMinutes: row.delay_at_checkout_in_minutes,
      previousEndedRentalId: row.previous_ended_rental_id,
      timeDeltaWithPreviousRentalInMinutes: row.time_delta_with_previous_rental_in_minutes,
    }),
  );
