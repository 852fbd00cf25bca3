import { resolve } from "node:path";
import { Test, type TestingModule } from "@nestjs/testing";
import { describe, expect, it } from "vitest";
import { RENTAL_DATASET_OPTIONS } from "./rental-dataset.const";
import {
  RentalDatasetInvalidException,
  RentalDatasetNotFoundException,
} from "./rental-dataset.error";
import type { RentalDatasetOptions } from "./rental-dataset.interface";
import { RentalDatasetService } from "./rental-dataset.service";

const FIXTURES = resolve(__dirname, "../../../test/fixtures");

async function createService(options: Partial<RentalDatasetOptions>): Promise<RentalDatasetService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      RentalDatasetService,
      {
        provide: RENTAL_DATASET_OPTIONS,
        useValue: { candidatePaths: [], preload: false, ...options } satisfies RentalDatasetOptions,
      },
    ],
  }).compile();

  return module.get(RentalDatasetService);
}

describe("RentalDatasetService", () => {
  it("loads the configured CSV file", async () => {
    const service = await createService({ dataPath: resolve(FIXTURES, "rentals.csv") });

    const dataset = await service.getDataset();

    expect(dataset.source).toBe(resolve(FIXTURES, "rentals.csv"));
    expect(dataset.records).toHaveLength(8);
    expect(dataset.records[4]).toEqual({
      rentalId: 5,
      carId: 20,
      checkinType: "mobile",
      state: "canceled",
      delayAtCheckoutInMinutes: 30,
      previousEndedRentalId: 4,
      timeDeltaWithPreviousRentalInMinutes: 240,
    });
    expect(service.getStatus()).toMatchObject({ state: "loaded", rowCount: 8 });
  });

  it("falls back to the first existing candidate path", async () => {
    const service = await createService({
      candidatePaths: [resolve(FIXTURES, "absent.xlsx"), resolve(FIXTURES, "rentals.csv")],
    });

    const dataset = await service.getDataset();

    expect(dataset.source).toBe(resolve(FIXTURES, "rentals.csv"));
  });

  it("shares a single load between concurrent callers", async () => {
    const service = await createService({ dataPath: resolve(FIXTURES, "rentals.csv") });

    const [first, second] = await Promise.all([service.getDataset(), service.getDataset()]);

    expect(first).toBe(second);
    expect(await service.getDataset()).toBe(first);
  });

  it("reload replaces the cached dataset", async () => {
    const service = await createService({ dataPath: resolve(FIXTURES, "rentals.csv") });
    const first = await service.getDataset();

    const reloaded = await service.reload();

    expect(reloaded).not.toBe(first);
    expect(reloaded.records).toEqual(first.records);
  });

  it("throws not found when no candidate exists and retries on the next call", async () => {
    const missing = resolve(FIXTURES, "absent.csv");
    const service = await createService({ dataPath: missing });

    await expect(service.getDataset()).rejects.toBeInstanceOf(RentalDatasetNotFoundException);
    expect(service.getStatus()).toEqual({
      state: "failed",
      error: `Rental dataset not found (searched: ${missing})`,
    });
    await expect(service.getDataset()).rejects.toBeInstanceOf(RentalDatasetNotFoundException);
  });

  it("rejects a file missing a required column", async () => {
    const service = await createService({
      dataPath: resolve(FIXTURES, "rentals-missing-column.csv"),
    });

    await expect(service.getDataset()).rejects.toThrow(
      "Rental dataset is missing required columns: time_delta_with_previous_rental_in_minutes",
    );
  });

  it("rejects a file with invalid values", async () => {
    const service = await createService({
      dataPath: resolve(FIXTURES, "rentals-invalid-values.csv"),
    });

    const error = await service.getDataset().catch((caught: unknown) => caught);

    if (!(error instanceof RentalDatasetInvalidException)) {
      throw new Error("Expected the load to fail with RentalDatasetInvalidException");
    }
    expect(error.getFieldErrors()).toEqual([
      expect.objectContaining({ field: "rows.2.delay_at_checkout_in_minutes" }),
      expect.objectContaining({ field: "rows.4.rental_id", code: "duplicate" }),
    ]);
  });

  it("logs instead of failing when preload cannot find the dataset", async () => {
    const service = await createService({ dataPath: resolve(FIXTURES, "absent.csv"), preload: true });

    await expect(service.onApplicationBootstrap()).resolves.toBeUndefined();
    expect(service.getStatus().state).toBe("failed");
  });

  it("does not touch the filesystem when preload is disabled", async () => {
    const service = await createService({ dataPath: resolve(FIXTURES, "rentals.csv") });

    await service.onApplicationBootstrap();

    expect(service.getStatus()).toEqual({ state: "idle" });
  });
});
