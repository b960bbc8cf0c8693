/***
 *
 * Validation Errors
 *
 * Raised by the dev-only helpers in assertions.ts when a plain number
 * does not satisfy the brand it is being cast to.
 *
 ***/

import { AppError } from "utils/error";

export enum VALIDATION_ERROR {
  NOT_A_POSITIVE_INTEGER = "NOT_A_POSITIVE_INTEGER",
  NOT_A_NON_NEGATIVE_INTEGER = "NOT_A_NON_NEGATIVE_INTEGER",
}

export class ValidationError extends AppError {
  constructor(
    public readonly category: VALIDATION_ERROR,
    public readonly value: unknown,
  ) {
    super(`${category}: received ${String(value)}`, false, { value });
  }
}
