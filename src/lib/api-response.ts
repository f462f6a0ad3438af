import { NextResponse } from "next/server";
import { randomUUID } from "node:crypto";
import type { ZodError } from "zod";
import { ERROR_CODES, type ErrorCode, type Rejection } from "@/lib/error-codes";

export function ok(data: unknown, init?: ResponseInit) {
  return NextResponse.json(data, { status: 200, ...(init ?? {}) });
}

export function created(data: unknown) {
  return NextResponse.json(data, { status: 201 });
}

export type ApiFieldError = {
  field: string;
  rule: string;
  expected?: string | number | boolean;
  actual?: unknown;
};

type ApiErrorOptions = {
  errorCode?: string;
  hint?: string;
  fieldErrors?: ApiFieldError[];
  retryable?: boolean;
  requestId?: string;
  retryAfterSeconds?: number;
};

export function zodFieldErrors(error: ZodError): ApiFieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "body",
    rule: issue.code,
    expected: issue.message
  }));
}

function errorJson(status: number, message: string, options?: ApiErrorOptions) {
  const retryAfterSeconds = options?.retryAfterSeconds ?? 0;
  const body = {
    error_code: options?.errorCode ?? "UNKNOWN_ERROR",
    message,
    hint: options?.hint,
    field_errors: options?.fieldErrors ?? [],
    retryable: options?.retryable ?? status >= 500,
    request_id: options?.requestId ?? `req_${randomUUID()}`,
    retry_after_seconds: retryAfterSeconds
  };

  const headers: Record<string, string> = {};
  if (retryAfterSeconds > 0) {
    headers["retry-after"] = String(retryAfterSeconds);
  }
  return NextResponse.json(body, { status, headers });
}

export function badRequest(message: string, options?: ApiErrorOptions) {
  return errorJson(400, message, { errorCode: ERROR_CODES.badRequest, ...options });
}

export function validationError(message: string, error: ZodError) {
  return badRequest(message, { fieldErrors: zodFieldErrors(error) });
}

export function unauthorized(message = "Unauthorized", options?: ApiErrorOptions) {
  return errorJson(401, message, { errorCode: ERROR_CODES.unauthorized, ...options, retryable: false });
}

export function forbidden(message = "Forbidden", options?: ApiErrorOptions) {
  return errorJson(403, message, { errorCode: ERROR_CODES.forbidden, ...options, retryable: false });
}

export function notFound(message = "Not found", options?: ApiErrorOptions) {
  return errorJson(404, message, { errorCode: ERROR_CODES.notFound, ...options, retryable: false });
}

export function conflict(message: string, options?: ApiErrorOptions) {
  return errorJson(409, message, { errorCode: ERROR_CODES.conflict, ...options, retryable: false });
}

export function unprocessableEntity(message: string, options?: ApiErrorOptions) {
  return errorJson(422, message, { errorCode: ERROR_CODES.unprocessableEntity, ...options, retryable: false });
}

export function badGateway(message: string, options?: ApiErrorOptions) {
  return errorJson(502, message, { errorCode: ERROR_CODES.transferFailed, ...options, retryable: true });
}

export function serverError(message: string, options?: ApiErrorOptions) {
  void message;
  return errorJson(500, "Internal server error", { errorCode: ERROR_CODES.internal, ...options, retryable: true });
}

const REJECTION_STATUS: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_ERROR: 500,
  UNPROCESSABLE_ENTITY: 422,
  SIGNATURE_INVALID: 401,
  REPLAY_DETECTED: 409,
  CALLER_UNAUTHORIZED: 403,
  DOCUMENT_NOT_FOUND: 404,
  INVALID_CLAUSE_ID: 404,
  INVALID_INPUT: 400,
  OUT_OF_RANGE: 422,
  INSUFFICIENT_FEE: 422,
  NOT_YET_REVIEWED: 409,
  ALREADY_REQUESTED: 409,
  ALREADY_COMPLETED: 409,
  ALREADY_REFUNDED: 409,
  NO_REQUEST_FOUND: 409,
  NOT_ELIGIBLE_FOR_REFUND: 409,
  INVALID_REQUEST: 404,
  INVALID_PROOF: 401,
  TRANSFER_FAILED: 502,
  NO_FUNDS: 409,
  ALREADY_AUTHORIZED: 409,
  NOT_A_REVIEWER: 404
};

/** Maps a ledger rejection onto the error envelope, keeping its code. */
export function rejectionResponse(rejection: Rejection) {
  const status = REJECTION_STATUS[rejection.code];
  return errorJson(status, rejection.error, { errorCode: rejection.code, retryable: status >= 500 });
}
