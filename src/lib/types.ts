export type ActorAddress = string;
export type OpaqueHandle = string;
export type DecryptionState = "pending" | "completed" | "failed";
export type DecryptionFailureCause = "timeout" | "refund";

/**
 * Sealed numeric container. Only the encryptor can produce one and only the
 * decryption gateway can open it; the core never sees the plaintext.
 */
export interface SealedValue {
  kind: "sealed";
  handle: OpaqueHandle;
}

export interface DocumentRecord {
  id: number;
  documentHash: string;
  publicTitle: string;
  submitter: ActorAddress;
  submissionTime: string;
  sealedScore: SealedValue;
  sealedRisk: SealedValue;
  isReviewed: boolean;
  clauseCount: number;
  /** Base units, decimal string. */
  feeEscrowed: string;
  /** Original fee, kept for reporting after the escrow is released. */
  feePaid: string;
  feeReleasedAt?: string;
  decryptionRequestId?: string;
  decryptionCompleted: boolean;
  refundProcessed: boolean;
  refundedAt?: string;
}

export interface ClauseReview {
  documentId: number;
  clauseId: number;
  clauseType: string;
  sealedCompliance: SealedValue;
  sealedSensitivity: SealedValue;
  notes: string;
  reviewer: ActorAddress;
  reviewTime: string;
}

export interface PrivacyAnalysis {
  documentId: number;
  sealedDataSensitivity: SealedValue;
  sealedGdprCompliance: SealedValue;
  sealedCcpaCompliance: SealedValue;
  sealedRetentionRisk: SealedValue;
  sealedSharingRisk: SealedValue;
  analysisComplete: boolean;
  analyzedBy?: ActorAddress;
  completedAt?: string;
}

export interface DecryptionRequest {
  requestId: string;
  documentId: number;
  requester: ActorAddress;
  requestTime: string;
  state: DecryptionState;
  decryptedScore?: number;
  decryptedRiskLevel?: number;
  resolvedAt?: string;
  failureCause?: DecryptionFailureCause;
}

export type LedgerEventPayload =
  | { type: "ReviewerAuthorized"; reviewer: ActorAddress; by: ActorAddress }
  | { type: "ReviewerRevoked"; reviewer: ActorAddress; by: ActorAddress }
  | { type: "Submitted"; documentId: number; submitter: ActorAddress; title: string }
  | { type: "ClauseReviewed"; documentId: number; clauseId: number; reviewer: ActorAddress }
  | { type: "AnalysisCompleted"; documentId: number; reviewer: ActorAddress }
  | { type: "ComplianceAlert"; documentId: number; riskLevel: number }
  | { type: "DecryptionRequested"; documentId: number; requestId: string; requester: ActorAddress }
  | { type: "DecryptionCompleted"; documentId: number; requestId: string; score: number; riskLevel: number }
  | { type: "DecryptionFailed"; documentId: number; requestId: string; reason: string }
  | { type: "RefundProcessed"; documentId: number; submitter: ActorAddress; amount: string }
  | { type: "TimeoutRefundClaimed"; documentId: number; submitter: ActorAddress; amount: string }
  | { type: "FundsWithdrawn"; to: ActorAddress; amount: string };

export type LedgerEventType = LedgerEventPayload["type"];

export type LedgerEvent = LedgerEventPayload & {
  sequence: number;
  emittedAt: string;
};

export interface RequestNonce {
  actor: ActorAddress;
  nonce: string;
  createdAt: string;
  expiresAt: string;
}

export interface AppState {
  owner: ActorAddress;
  reviewers: ActorAddress[];
  documentCounter: number;
  platformFunds: string;
  totalRefunded: string;
  totalWithdrawn: string;
  documents: DocumentRecord[];
  clauses: ClauseReview[];
  analyses: PrivacyAnalysis[];
  decryptionRequests: DecryptionRequest[];
  submitterIndex: Record<ActorAddress, number[]>;
  reviewerIndex: Record<ActorAddress, number[]>;
  events: LedgerEvent[];
  eventSequence: number;
  requestNonces: RequestNonce[];
}

export interface DocumentInfo {
  documentHash: string;
  submitter: ActorAddress;
  submissionTime: string;
  isReviewed: boolean;
  publicTitle: string;
  clauseCount: number;
}

export interface ClauseInfo {
  clauseType: string;
  reviewer: ActorAddress;
  reviewTime: string;
  notes: string;
}

export interface DecryptionStatus {
  requestId: string;
  state: DecryptionState;
  requester: ActorAddress;
  requestTime: string;
  decryptedScore?: number;
  decryptedRiskLevel?: number;
  failureCause?: DecryptionFailureCause;
}

export interface FundsSummary {
  platformFunds: string;
  totalEscrowed: string;
  totalRefunded: string;
  totalWithdrawn: string;
}
