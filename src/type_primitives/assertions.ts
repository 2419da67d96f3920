/***
 * Assertions — Dev-only validation and branded casting.
 *
 * Every check sits behind __DEV__ and disappears from production builds.
 * validate_and_cast mints branded numbers (EntityID, ComponentBit,
 * FamilyIndex): it checks the input in dev and hands it back as the
 * branded type.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

export const is_non_negative_finite = (v: number): boolean =>
  Number.isFinite(v) && v >= 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
    );
  }
  return value as Result;
}
