export const APP_NAME = "SealedReview";
export const APP_VERSION = "0.1.0";

// 0.001 of the native unit, in base units (10^18 per unit).
export const MIN_REVIEW_FEE_DEFAULT = 1_000_000_000_000_000n;
export const DECRYPTION_TIMEOUT_MS_DEFAULT = 60 * 60 * 1000;
export const SIGNATURE_MAX_SKEW_MS_DEFAULT = 5 * 60 * 1000;
export const NONCE_TTL_MS = 10 * 60 * 1000;

export const COMPLIANCE_RANGE = { min: 0, max: 10 } as const;
export const SENSITIVITY_RANGE = { min: 1, max: 5 } as const;
export const DATA_SENSITIVITY_RANGE = { min: 0, max: 100 } as const;
export const RISK_RANGE = { min: 1, max: 5 } as const;

export const DEFAULT_SEALED_SCORE = 0;
export const DEFAULT_SEALED_RISK = 3;

// Applied before sealing the aggregate score; decrypted scores come back multiplied.
export const SCORE_OBFUSCATION_MULTIPLIER = 10;
export const ALERT_SCORE_BELOW = 5;
export const ALERT_RISK_AT_LEAST = 4;

export const TIMEOUT_FAILURE_REASON = "timeout exceeded";

export const LIST_PAGE_LIMIT_DEFAULT = 50;
export const LIST_PAGE_LIMIT_MAX = 500;

export const EVENT_TYPES = {
  reviewerAuthorized: "ReviewerAuthorized",
  reviewerRevoked: "ReviewerRevoked",
  submitted: "Submitted",
  clauseReviewed: "ClauseReviewed",
  analysisCompleted: "AnalysisCompleted",
  complianceAlert: "ComplianceAlert",
  decryptionRequested: "DecryptionRequested",
  decryptionCompleted: "DecryptionCompleted",
  decryptionFailed: "DecryptionFailed",
  refundProcessed: "RefundProcessed",
  timeoutRefundClaimed: "TimeoutRefundClaimed",
  fundsWithdrawn: "FundsWithdrawn"
} as const;
