import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";
import type { FieldError } from "../../common/errors/problem-details.interface";

export const RentalDatasetErrorCode = {
  RENTAL_DATASET_NOT_FOUND: "RENTAL_DATASET_NOT_FOUND",
  RENTAL_DATASET_INVALID: "RENTAL_DATASET_INVALID",
} as const;

export class RentalDatasetException extends AppException {}

export class RentalDatasetNotFoundException extends RentalDatasetException {
  constructor(searched: readonly string[]) {
    super(
      RentalDatasetErrorCode.RENTAL_DATASET_NOT_FOUND,
      `Rental dataset not found (searched: ${searched.join(", ")})`,
      HttpStatus.NOT_FOUND,
      { title: "Rental Dataset Not Found", details: { searched: [...searched] } },
    );
  }
}

export class RentalDatasetInvalidException extends RentalDatasetException {
  constructor(detail: string, errors: FieldError[] = []) {
    super(RentalDatasetErrorCode.RENTAL_DATASET_INVALID, detail, HttpStatus.UNPROCESSABLE_ENTITY, {
      title: "Rental Dataset Invalid",
      ...(errors.length > 0 && { errors }),
    });
  }
}
