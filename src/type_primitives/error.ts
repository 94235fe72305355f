/***
 * Type errors — Validation and assertion failure errors.
 *
 * Raised only by dev-mode checks. A TypeError always means the caller
 * broke a precondition, so it is never operational; recoverable container
 * failures use ContainerError instead.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  ASSERTION_FAIL_CONDITION = "ASSERTION_FAIL_CONDITION",
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
