import { VALIDATION_ERROR, ValidationError } from "./error";

export const is_positive_integer = (value: number): boolean =>
  Number.isSafeInteger(value) && value > 0;

export const is_non_negative_integer = (value: number): boolean =>
  Number.isSafeInteger(value) && value >= 0;

export function validate_and_cast<Result extends number>(
  value: number,
  validator: (v: number) => boolean,
  category: VALIDATION_ERROR,
): Result {
  //
  // Brands a plain number after checking it
  // The check only runs in dev builds, like every other
  // internal assertion: callers validate user input themselves
  //
  if (__DEV__ && !validator(value)) {
    throw new ValidationError(category, value);
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
