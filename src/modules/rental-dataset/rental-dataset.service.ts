import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Inject, Injectable, Logger, type OnApplicationBootstrap } from "@nestjs/common";
import { RENTAL_DATASET_OPTIONS } from "./rental-dataset.const";
import { RentalDatasetNotFoundException } from "./rental-dataset.error";
import { parseRentalTable, readSheetRows } from "./rental-dataset.helper";
import type {
  RentalDataset,
  RentalDatasetOptions,
  RentalDatasetStatus,
} from "./rental-dataset.interface";

/**
 * Loads the rental table once per process and hands the same immutable
 * dataset to every caller.
 *
 * Concurrent first callers share one in-flight load. A failed load is not
 * cached, so the next call tries again; `reload()` drops a loaded dataset.
 */
@Injectable()
export class RentalDatasetService implements OnApplicationBootstrap {
  private readonly logger = new Logger(RentalDatasetService.name);

  private pending: Promise<RentalDataset> | null = null;
  private status: RentalDatasetStatus = { state: "idle" };

  constructor(
    @Inject(RENTAL_DATASET_OPTIONS) private readonly options: RentalDatasetOptions,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.options.preload) {
      return;
    }

    try {
      await this.getDataset();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Rental dataset preload failed: ${message}`);
    }
  }

  getDataset(): Promise<RentalDataset> {
    if (this.pending) {
      return this.pending;
    }

    this.status = { state: "loading" };
    const pending: Promise<RentalDataset> = this.load().then(
      (dataset) => {
        if (this.pending === pending) {
          this.status = {
            state: "loaded",
            source: dataset.source,
            rowCount: dataset.records.length,
            loadedAt: dataset.loadedAt.toISOString(),
          };
        }
        return dataset;
      },
      (error: unknown) => {
        if (this.pending === pending) {
          this.pending = null;
          this.status = {
            state: "failed",
            error: error instanceof Error ? error.message : String(error),
          };
        }
        throw error;
      },
    );
    this.pending = pending;

    return pending;
  }

  reload(): Promise<RentalDataset> {
    this.logger.log("Reloading rental dataset");
    this.pending = null;
    return this.getDataset();
  }

  getStatus(): RentalDatasetStatus {
    return this.status;
  }

  private async load(): Promise<RentalDataset> {
    const source = await this.resolveSource();
    this.logger.log(`Loading rental dataset from ${source}`);

    const content = await readFile(source);
    const records = parseRentalTable(readSheetRows(content));

    this.logger.log(`Loaded ${records.length} rentals from ${source}`);
    return { records, source, loadedAt: new Date() };
  }

  private async resolveSource(): Promise<string> {
    const candidates = this.options.dataPath
      ? [this.options.dataPath]
      : [...this.options.candidatePaths];

    for (const candidate of candidates) {
      const path = resolve(candidate);
      if (await this.exists(path)) {
        return path;
      }
      this.logger.debug(`No rental dataset at ${path}`);
    }

    throw new RentalDatasetNotFoundException(candidates);
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }
}
