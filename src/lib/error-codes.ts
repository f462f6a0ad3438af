export const ERROR_CODES = {
  badRequest: "BAD_REQUEST",
  unauthorized: "UNAUTHORIZED",
  forbidden: "FORBIDDEN",
  notFound: "NOT_FOUND",
  conflict: "CONFLICT",
  internal: "INTERNAL_ERROR",
  unprocessableEntity: "UNPROCESSABLE_ENTITY",
  signatureInvalid: "SIGNATURE_INVALID",
  replayDetected: "REPLAY_DETECTED",

  callerUnauthorized: "CALLER_UNAUTHORIZED",
  documentNotFound: "DOCUMENT_NOT_FOUND",
  invalidClauseId: "INVALID_CLAUSE_ID",
  invalidInput: "INVALID_INPUT",
  outOfRange: "OUT_OF_RANGE",
  insufficientFee: "INSUFFICIENT_FEE",
  notYetReviewed: "NOT_YET_REVIEWED",
  alreadyRequested: "ALREADY_REQUESTED",
  alreadyCompleted: "ALREADY_COMPLETED",
  alreadyRefunded: "ALREADY_REFUNDED",
  noRequestFound: "NO_REQUEST_FOUND",
  notEligibleForRefund: "NOT_ELIGIBLE_FOR_REFUND",
  invalidRequest: "INVALID_REQUEST",
  invalidProof: "INVALID_PROOF",
  transferFailed: "TRANSFER_FAILED",
  noFunds: "NO_FUNDS",
  alreadyAuthorized: "ALREADY_AUTHORIZED",
  notAReviewer: "NOT_A_REVIEWER"
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface Rejection {
  error: string;
  code: ErrorCode;
}

export function reject(code: ErrorCode, error: string): Rejection {
  return { error, code };
}

export function isRejection(value: unknown): value is Rejection {
  return typeof value === "object" && value !== null && "error" in value && "code" in value;
}
