import * as XLSX from "xlsx";
import type { FieldError } from "../../common/errors/problem-details.interface";
import { mapZodIssuesToFieldErrors } from "../../common/pipes/zod-validation.pipe";
import {
  MAX_REPORTED_ROW_ERRORS,
  REQUIRED_RENTAL_COLUMNS,
  UNNAMED_COLUMN_PREFIX,
} from "./rental-dataset.const";
import { RentalDatasetInvalidException } from "./rental-dataset.error";
import type { RentalRecord } from "./rental-dataset.interface";
import { rentalRowSchema } from "./rental-dataset.schema";

function isBlankCell(cell: unknown): boolean {
  return cell === null || (typeof cell === "string" && cell.trim() === "");
}

/**
 * Reads the first sheet of a CSV or XLSX document as an array of rows,
 * header row first. Blank cells come back as null.
 *
 * Text formats are parsed raw: CSV cells stay strings (no date, percent or
 * currency guessing) and numbers are left to the row schema.
 */
export function readSheetRows(content: Buffer): unknown[][] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(content, { type: "buffer", raw: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RentalDatasetInvalidException(`Unable to read rental spreadsheet: ${message}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return [];
  }

  return XLSX.utils
    .sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      blankrows: false,
      raw: true,
    })
    .map((row) => row.map((cell) => (isBlankCell(cell) ? null : cell)));
}

function isIgnoredColumn(header: string): boolean {
  return header === "" || header.toLowerCase().startsWith(UNNAMED_COLUMN_PREFIX);
}

/**
 * Validates a header-first table and maps it to rental records.
 *
 * The whole table is rejected on the first problem class found: missing
 * columns, no data rows, then per-row value errors and duplicate ids.
 * Blank cells are not errors; they become null fields.
 */
export function parseRentalTable(table: readonly unknown[][]): RentalRecord[] {
  const [headerRow = [], ...dataRows] = table;
  const headers = headerRow.map((cell) =>
    cell === null || cell === undefined ? "" : String(cell).trim(),
  );

  const missing = REQUIRED_RENTAL_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new RentalDatasetInvalidException(
      `Rental dataset is missing required columns: ${missing.join(", ")}`,
      missing.map((column) => ({
        field: column,
        code: "missing_column",
        message: `Required column "${column}" is missing`,
      })),
    );
  }

  if (dataRows.length === 0) {
    throw new RentalDatasetInvalidException("Rental dataset contains no rental rows");
  }

  const records: RentalRecord[] = [];
  const errors: FieldError[] = [];
  const firstRowById = new Map<number, number>();

  dataRows.forEach((cells, index) => {
    // Spreadsheet numbering: the header is row 1.
    const rowNumber = index + 2;
    const raw: Record<string, unknown> = {};
    headers.forEach((header, column) => {
      if (!isIgnoredColumn(header)) {
        raw[header] = cells[column] ?? null;
      }
    });

    const result = rentalRowSchema.safeParse(raw);
    if (!result.success) {
      errors.push(...mapZodIssuesToFieldErrors(result.error.issues, `rows.${rowNumber}`));
      return;
    }

    const record = result.data;
    const firstRow = firstRowById.get(record.rentalId);
    if (firstRow !== undefined) {
      errors.push({
        field: `rows.${rowNumber}.rental_id`,
        code: "duplicate",
        message: `rental_id ${record.rentalId} already appears on row ${firstRow}`,
      });
      return;
    }

    firstRowById.set(record.rentalId, rowNumber);
    records.push(record);
  });

  if (errors.length > 0) {
    throw new RentalDatasetInvalidException(
      `Rental dataset has ${errors.length} invalid value(s)`,
      errors.slice(0, MAX_REPORTED_ROW_ERRORS),
    );
  }

  return records;
}
