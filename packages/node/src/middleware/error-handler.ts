/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps engine errors (AccrualError, DelegationError) and Zod
 * validation errors to HTTP status codes.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { AccrualError } from "@ubistream/accrual";
import type { AccrualErrorCode } from "@ubistream/accrual";
import { DelegationError } from "@ubistream/delegation";
import type { DelegationErrorCode } from "@ubistream/delegation";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<AccrualErrorCode | DelegationErrorCode, ErrorStatus>> = {
  // Accrual errors
  NOT_VERIFIED: 409,
  STILL_VERIFIED: 409,
  ALREADY_ACCRUING: 409,
  NOT_ACCRUING: 409,
  INSUFFICIENT_BALANCE: 422,
  INVALID_AMOUNT: 400,
  TIME_BEFORE_CHECKPOINT: 400,
  CLOCK_REGRESSION: 500,

  // Delegation errors
  NOT_ELIGIBLE: 409,
  INVALID_RECIPIENT: 400,
  ZERO_RATE: 400,
  STARTS_IN_PAST: 400,
  INVALID_WINDOW: 400,
  RATE_EXCEEDS_BASE: 422,
  TOO_MANY_DELEGATIONS: 422,
  OVERLAPPING_TO_SAME_RECIPIENT: 409,
  CIRCULAR_DELEGATION: 409,
  INSUFFICIENT_CAPACITY: 422,
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  AMOUNT_EXCEEDS_AVAILABLE: 422,
  NOTHING_TO_WITHDRAW: 409,
  NOT_CANCELLABLE: 409,
  REENTRANT_CALL: 409,
  INVALID_CONFIG: 400,
};

export function statusForCode(code: AccrualErrorCode | DelegationErrorCode): ErrorStatus {
  return STATUS_MAP[code];
}

function toResponse(err: Error): { status: ErrorStatus; envelope: ErrorEnvelope } {
  if (err instanceof AccrualError || err instanceof DelegationError) {
    const status = statusForCode(err.code);
    // Don't leak internal details
    const message = status === 500 ? "Internal server error" : err.message;
    return {
      status,
      envelope: createErrorEnvelope(status === 500 ? "INTERNAL_ERROR" : err.code, message),
    };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      envelope: createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: err.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      }),
    };
  }

  return {
    status: 500,
    envelope: createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
  };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, envelope } = toResponse(err);
  return c.json(envelope, status);
}
