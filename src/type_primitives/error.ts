/***
 * Type errors — Validation and assertion failure errors.
 *
 * Kept apart from ECSError so the type primitives carry no dependency
 * on the engine's error categories.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
