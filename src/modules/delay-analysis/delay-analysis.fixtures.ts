import type { RentalRecord } from "../rental-dataset/rental-dataset.interface";

export function createRental(overrides: Partial<RentalRecord> & Pick<RentalRecord, "rentalId">): RentalRecord {
  return {
    carId: null,
    checkinType: "mobile",
    state: "ended",
    delayAtCheckoutInMinutes: null,
    previousEndedRentalId: null,
    timeDeltaWithPreviousRentalInMinutes: null,
    ...overrides,
  };
}

/**
 * Same rows as test/fixtures/rentals.csv.
 *
 * Rental 4's 800 minute delay clamps to 720; rental 8 points at a
 * predecessor outside the table.
 */
export const FIXTURE_RENTALS: readonly RentalRecord[] = [
  createRental({ rentalId: 1, carId: 10, delayAtCheckoutInMinutes: 100 }),
  createRental({
    rentalId: 2,
    carId: 10,
    checkinType: "connect",
    delayAtCheckoutInMinutes: -20,
    previousEndedRentalId: 1,
    timeDeltaWithPreviousRentalInMinutes: 60,
  }),
  createRental({
    rentalId: 3,
    carId: 10,
    checkinType: "connect",
    state: "canceled",
    previousEndedRentalId: 2,
    timeDeltaWithPreviousRentalInMinutes: 0,
  }),
  createRental({ rentalId: 4, carId: 20, delayAtCheckoutInMinutes: 800 }),
  createRental({
    rentalId: 5,
    carId: 20,
    state: "canceled",
    delayAtCheckoutInMinutes: 30,
    previousEndedRentalId: 4,
    timeDeltaWithPreviousRentalInMinutes: 240,
  }),
  createRental({ rentalId: 6, carId: 30, checkinType: "connect", delayAtCheckoutInMinutes: 0 }),
  createRental({
    rentalId: 7,
    carId: 30,
    checkinType: "connect",
    delayAtCheckoutInMinutes: 15,
    previousEndedRentalId: 6,
    timeDeltaWithPreviousRentalInMinutes: 120,
  }),
  createRental({
    rentalId: 8,
    carId: 40,
    delayAtCheckoutInMinutes: 45,
    previousEndedRentalId: 99,
    timeDeltaWithPreviousRentalInMinutes: 30,
  }),
];
