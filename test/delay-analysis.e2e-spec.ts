import { resolve } from "node:path";
import { HttpStatus, type INestApplication } from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import { Test, type TestingModule } from "@nestjs/testing";
import request from "supertest";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { AppModule } from "../src/app.module";
import { GlobalExceptionFilter } from "../src/common/filters/global-exception.filter";
import { RENTAL_DATASET_OPTIONS } from "../src/modules/rental-dataset/rental-dataset.const";
import type { RentalDatasetOptions } from "../src/modules/rental-dataset/rental-dataset.interface";

const FIXTURE_PATH = resolve(__dirname, "fixtures/rentals.csv");

describe("Delay Analysis E2E Tests", () => {
  let app: INestApplication;

  beforeAll(async () => {
    const options: RentalDatasetOptions = {
      dataPath: FIXTURE_PATH,
      candidatePaths: [],
      preload: true,
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(RENTAL_DATASET_OPTIONS)
      .useValue(options)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    const httpAdapterHost = app.get(HttpAdapterHost);
    app.useGlobalFilters(new GlobalExceptionFilter(httpAdapterHost));
    await app.init();
  });

  afterAll(async () => {
    await app?.close();
  });

  describe("GET /api/delay-analysis/summary", () => {
    it("should summarize the loaded dataset", async () => {
      const response = await request(app.getHttpServer()).get("/api/delay-analysis/summary");

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body).toEqual({
        totalRentals: 8,
        connectRentals: 4,
        mobileRentals: 4,
        canceledRentals: 2,
        rentalsWithPrevious: 5,
        byCheckinType: { mobile: 4, connect: 4 },
        byState: { ended: 6, canceled: 2 },
      });
    });
  });

  describe("GET /api/delay-analysis/impact", () => {
    it("should use the default threshold and scope", async () => {
      const response = await request(app.getHttpServer()).get("/api/delay-analysis/impact");

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body).toMatchObject({
        totalRentals: 8,
        rentalsWithPrevious: 5,
        blockedRentals: 3,
        blockedPercentage: 60,
        currentProblems: 2,
        problemsSolved: 1,
        availabilityImpact: 37.5,
      });
    });

    it("should restrict the population to connect cars", async () => {
      const response = await request(app.getHttpServer())
        .get("/api/delay-analysis/impact")
        .query({ threshold: 120, scope: "connect" });

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body).toMatchObject({
        totalRentals: 4,
        blockedRentals: 2,
        problemsSolved: 1,
        solveEfficiency: 50,
        availabilityImpact: 50,
      });
    });

    it("should reject a non-numeric threshold", async () => {
      const response = await request(app.getHttpServer())
        .get("/api/delay-analysis/impact")
        .query({ threshold: "soon" });

      expect(response.status).toBe(HttpStatus.BAD_REQUEST);
      expect(response.body.errorCode).toBe("VALIDATION_ERROR");
      expect(response.body.errors[0].field).toBe("threshold");
    });
  });

  describe("GET /api/delay-analysis/sweep", () => {
    it("should evaluate an explicit threshold list in order", async () => {
      const response = await request(app.getHttpServer())
        .get("/api/delay-analysis/sweep")
        .query({ thresholds: "270,0" });

      expect(response.status).toBe(HttpStatus.OK);
      expect(
        response.body.map((row: { threshold: number; problemsSolved: number }) => [
          row.threshold,
          row.problemsSolved,
        ]),
      ).toEqual([
        [270, 2],
        [0, 0],
      ]);
    });

    it("should reject an inverted range", async () => {
      const response = await request(app.getHttpServer())
        .get("/api/delay-analysis/sweep")
        .query({ from: 120, to: 60 });

      expect(response.status).toBe(HttpStatus.BAD_REQUEST);
      expect(response.body).toMatchObject({
        errorCode: "DELAY_ANALYSIS_VALIDATION_ERROR",
        detail: "from must not be greater than to",
        instance: "/api/delay-analysis/sweep?from=120&to=60",
      });
    });
  });

  describe("GET /api/delay-analysis/gaps", () => {
    it("should bin the gaps between consecutive rentals", async () => {
      const response = await request(app.getHttpServer()).get("/api/delay-analysis/gaps");

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body.map((bin: { count: number }) => bin.count)).toEqual([
        2, 1, 1, 0, 1, 0, 0, 0,
      ]);
    });
  });

  describe("GET /api/delay-analysis/recommendation", () => {
    it("should recommend connect cars for the fixture", async () => {
      const response = await request(app.getHttpServer()).get(
        "/api/delay-analysis/recommendation",
      );

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body).toMatchObject({ threshold: 120, scope: "connect" });
    });
  });

  describe("POST /api/delay-analysis/reload", () => {
    it("should reload the dataset and return its summary", async () => {
      const response = await request(app.getHttpServer()).post("/api/delay-analysis/reload");

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body.totalRentals).toBe(8);
    });
  });

  describe("GET /health", () => {
    it("should report the dataset as up", async () => {
      const response = await request(app.getHttpServer()).get("/health");

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body.status).toBe("ok");
      expect(response.body.info.rentalDataset).toEqual({
        status: "up",
        source: FIXTURE_PATH,
        rowCount: 8,
      });
    });

    it("should report the dataset load state", async () => {
      const response = await request(app.getHttpServer()).get("/health/dataset");

      expect(response.status).toBe(HttpStatus.OK);
      expect(response.body).toMatchObject({
        state: "loaded",
        source: FIXTURE_PATH,
        rowCount: 8,
      });
    });
  });
});
