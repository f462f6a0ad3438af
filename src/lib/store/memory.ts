import { aggregateAnalysis, validateAnalysisInput, type AnalysisInput } from "@/lib/analysis/aggregate";
import type { Collaborators, DecryptionCallbackTarget } from "@/lib/collaborators/types";
import {
  COMPLIANCE_RANGE,
  DECRYPTION_TIMEOUT_MS_DEFAULT,
  DEFAULT_SEALED_RISK,
  DEFAULT_SEALED_SCORE,
  LIST_PAGE_LIMIT_DEFAULT,
  LIST_PAGE_LIMIT_MAX,
  MIN_REVIEW_FEE_DEFAULT,
  NONCE_TTL_MS,
  SENSITIVITY_RANGE,
  TIMEOUT_FAILURE_REASON
} from "@/lib/constants";
import { decodeScoreAndRisk } from "@/lib/decryption/codec";
import { evaluateRefundEligibility, isRequestStale, type RefundEligibility } from "@/lib/decryption/eligibility";
import { ERROR_CODES, reject, type Rejection } from "@/lib/error-codes";
import { isActorAddress, normalizeAddress } from "@/lib/protocol/signatures";
import { isOwner, isReviewer, isSubmitterOrReviewer } from "@/lib/store/guards";
import type {
  ActorAddress,
  AppState,
  ClauseInfo,
  ClauseReview,
  DecryptionRequest,
  DecryptionStatus,
  DocumentInfo,
  DocumentRecord,
  FundsSummary,
  LedgerEvent,
  LedgerEventPayload,
  LedgerEventType,
  OpaqueHandle,
  PrivacyAnalysis,
  SealedValue
} from "@/lib/types";
import { addMs, formatAmount, isIntegerInRange, nowIso, paginate, toAmount } from "@/lib/utils";

export interface StoreOptions {
  owner: ActorAddress;
  collaborators: Collaborators;
  decryptionTimeoutMs?: number;
  minReviewFee?: bigint;
}

export type CallbackOutcome =
  | { outcome: "completed"; documentId: number; requestId: string; score: number; riskLevel: number }
  | { outcome: "failed"; documentId: number; requestId: string; reason: string };

interface PageParams {
  limit?: number;
  offset?: number;
}

interface RefundPlan {
  document: DocumentRecord;
  request: DecryptionRequest;
  eligibility: RefundEligibility;
  amount: bigint;
}

export function createGenesisState(owner: ActorAddress): AppState {
  const normalized = normalizeAddress(owner);
  return {
    owner: normalized,
    reviewers: [normalized],
    documentCounter: 0,
    platformFunds: "0",
    totalRefunded: "0",
    totalWithdrawn: "0",
    documents: [],
    clauses: [],
    analyses: [],
    decryptionRequests: [],
    submitterIndex: {},
    reviewerIndex: {},
    events: [],
    eventSequence: 0,
    requestNonces: []
  };
}

/**
 * Review ledger state machine. Every public operation runs to completion
 * synchronously and either commits all of its writes or returns a rejection
 * without touching state.
 */
export class MemoryStore implements DecryptionCallbackTarget {
  state: AppState;
  private readonly collaborators: Collaborators;
  private readonly decryptionTimeoutMs: number;
  private readonly minReviewFee: bigint;

  constructor(options: StoreOptions, initialState?: AppState) {
    this.collaborators = options.collaborators;
    this.decryptionTimeoutMs = options.decryptionTimeoutMs ?? DECRYPTION_TIMEOUT_MS_DEFAULT;
    this.minReviewFee = options.minReviewFee ?? MIN_REVIEW_FEE_DEFAULT;
    this.state = initialState ? structuredClone(initialState) : createGenesisState(options.owner);
  }

  private emit(payload: LedgerEventPayload): LedgerEvent {
    this.state.eventSequence += 1;
    const event: LedgerEvent = { ...payload, sequence: this.state.eventSequence, emittedAt: nowIso() };
    this.state.events.push(event);
    return event;
  }

  private grant(value: SealedValue, ...actors: ActorAddress[]) {
    for (const actor of new Set(actors)) {
      this.collaborators.encryptor.allow(value, actor);
    }
  }

  private seal(plaintext: number, ...actors: ActorAddress[]): SealedValue {
    const sealed = this.collaborators.encryptor.seal(plaintext);
    this.grant(sealed, this.state.owner, ...actors);
    return sealed;
  }

  snapshotState(): AppState {
    return structuredClone(this.state);
  }

  // ── Actor registry ────────────────────────────────────────────────────

  owner(): ActorAddress {
    return this.state.owner;
  }

  isAuthorizedReviewer(actor: ActorAddress): boolean {
    return isReviewer(this.state, normalizeAddress(actor));
  }

  listReviewers(): ActorAddress[] {
    return [...this.state.reviewers];
  }

  authorizeReviewer(input: { caller: ActorAddress; reviewer: ActorAddress }) {
    const caller = normalizeAddress(input.caller);
    const reviewer = normalizeAddress(input.reviewer);
    if (!isOwner(this.state, caller)) return reject(ERROR_CODES.callerUnauthorized, "Not authorized");
    if (!isActorAddress(reviewer)) return reject(ERROR_CODES.invalidInput, "Reviewer address is invalid");
    if (isReviewer(this.state, reviewer)) return reject(ERROR_CODES.alreadyAuthorized, "Reviewer already authorized");

    this.state.reviewers.push(reviewer);
    this.emit({ type: "ReviewerAuthorized", reviewer, by: caller });
    return { reviewer };
  }

  revokeReviewer(input: { caller: ActorAddress; reviewer: ActorAddress }) {
    const caller = normalizeAddress(input.caller);
    const reviewer = normalizeAddress(input.reviewer);
    if (!isOwner(this.state, caller)) return reject(ERROR_CODES.callerUnauthorized, "Not authorized");
    if (isOwner(this.state, reviewer)) return reject(ERROR_CODES.invalidInput, "Owner reviewer capability cannot be revoked");
    if (!isReviewer(this.state, reviewer)) return reject(ERROR_CODES.notAReviewer, "Address is not an authorized reviewer");

    this.state.reviewers = this.state.reviewers.filter((r) => r !== reviewer);
    this.emit({ type: "ReviewerRevoked", reviewer, by: caller });
    return { reviewer };
  }

  // ── Document store ────────────────────────────────────────────────────

  getDocument(documentId: number): DocumentRecord | null {
    if (!Number.isInteger(documentId) || documentId < 1 || documentId > this.state.documentCounter) return null;
    return this.state.documents.find((d) => d.id === documentId) ?? null;
  }

  private requireDocument(documentId: number): DocumentRecord | Rejection {
    return this.getDocument(documentId) ?? reject(ERROR_CODES.documentNotFound, "Invalid document ID");
  }

  submitDocument(input: { submitter: ActorAddress; documentHash: string; publicTitle: string; fee: bigint }) {
    const submitter = normalizeAddress(input.submitter);
    if (input.documentHash === "") return reject(ERROR_CODES.invalidInput, "Document hash cannot be empty");
    if (input.publicTitle === "") return reject(ERROR_CODES.invalidInput, "Title cannot be empty");
    if (input.fee < this.minReviewFee) {
      return reject(ERROR_CODES.insufficientFee, `Review fee must be at least ${formatAmount(this.minReviewFee)}`);
    }

    const sealedScore = this.seal(DEFAULT_SEALED_SCORE, submitter);
    const sealedRisk = this.seal(DEFAULT_SEALED_RISK, submitter);
    const pendingAnalysis = {
      sealedDataSensitivity: this.seal(0),
      sealedGdprCompliance: this.seal(0),
      sealedCcpaCompliance: this.seal(0),
      sealedRetentionRisk: this.seal(DEFAULT_SEALED_RISK),
      sealedSharingRisk: this.seal(DEFAULT_SEALED_RISK)
    };

    const documentId = this.state.documentCounter + 1;
    const fee = formatAmount(input.fee);
    const document: DocumentRecord = {
      id: documentId,
      documentHash: input.documentHash,
      publicTitle: input.publicTitle,
      submitter,
      submissionTime: nowIso(),
      sealedScore,
      sealedRisk,
      isReviewed: false,
      clauseCount: 0,
      feeEscrowed: fee,
      feePaid: fee,
      decryptionCompleted: false,
      refundProcessed: false
    };
    const analysis: PrivacyAnalysis = { documentId, ...pendingAnalysis, analysisComplete: false };

    this.state.documentCounter = documentId;
    this.state.documents.push(document);
    this.state.analyses.push(analysis);
    this.state.platformFunds = formatAmount(toAmount(this.state.platformFunds) + input.fee);
    (this.state.submitterIndex[submitter] ??= []).push(documentId);
    this.emit({ type: "Submitted", documentId, submitter, title: input.publicTitle });
    return { documentId, document };
  }

  getInfo(documentId: number): DocumentInfo | Rejection {
    const document = this.requireDocument(documentId);
    if ("error" in document) return document;
    return {
      documentHash: document.documentHash,
      submitter: document.submitter,
      submissionTime: document.submissionTime,
      isReviewed: document.isReviewed,
      publicTitle: document.publicTitle,
      clauseCount: document.clauseCount
    };
  }

  getTotalDocuments(): number {
    return this.state.documentCounter;
  }

  getSubmitterDocuments(submitter: ActorAddress, page: PageParams = {}): number[] {
    const ids = this.state.submitterIndex[normalizeAddress(submitter)] ?? [];
    return paginate(ids, page, LIST_PAGE_LIMIT_MAX, LIST_PAGE_LIMIT_DEFAULT);
  }

  getReviewerDocuments(reviewer: ActorAddress, page: PageParams = {}): number[] {
    const ids = this.state.reviewerIndex[normalizeAddress(reviewer)] ?? [];
    return paginate(ids, page, LIST_PAGE_LIMIT_MAX, LIST_PAGE_LIMIT_DEFAULT);
  }

  // ── Clause review log ─────────────────────────────────────────────────

  addClause(input: {
    reviewer: ActorAddress;
    documentId: number;
    clauseType: string;
    compliance: number;
    sensitivity: number;
    notes: string;
  }) {
    const reviewer = normalizeAddress(input.reviewer);
    if (!isReviewer(this.state, reviewer)) return reject(ERROR_CODES.callerUnauthorized, "Not authorized reviewer");
    const document = this.requireDocument(input.documentId);
    if ("error" in document) return document;
    if (input.clauseType === "") return reject(ERROR_CODES.invalidInput, "Clause type cannot be empty");
    if (!isIntegerInRange(input.compliance, COMPLIANCE_RANGE)) return reject(ERROR_CODES.outOfRange, "Compliance rating must be 0-10");
    if (!isIntegerInRange(input.sensitivity, SENSITIVITY_RANGE)) return reject(ERROR_CODES.outOfRange, "Sensitivity must be 1-5");

    const clause: ClauseReview = {
      documentId: document.id,
      clauseId: document.clauseCount + 1,
      clauseType: input.clauseType,
      sealedCompliance: this.seal(input.compliance, reviewer),
      sealedSensitivity: this.seal(input.sensitivity, reviewer),
      notes: input.notes,
      reviewer,
      reviewTime: nowIso()
    };
    this.state.clauses.push(clause);
    document.clauseCount = clause.clauseId;
    (this.state.reviewerIndex[reviewer] ??= []).push(document.id);
    this.emit({ type: "ClauseReviewed", documentId: document.id, clauseId: clause.clauseId, reviewer });
    return { clauseId: clause.clauseId, clause };
  }

  getClause(documentId: number, clauseId: number): ClauseInfo | Rejection {
    const document = this.requireDocument(documentId);
    if ("error" in document) return document;
    if (!Number.isInteger(clauseId) || clauseId < 1 || clauseId > document.clauseCount) {
      return reject(ERROR_CODES.invalidClauseId, "Invalid clause ID");
    }
    const clause = this.state.clauses.find((c) => c.documentId === documentId && c.clauseId === clauseId);
    if (!clause) return reject(ERROR_CODES.invalidClauseId, "Invalid clause ID");
    return {
      clauseType: clause.clauseType,
      reviewer: clause.reviewer,
      reviewTime: clause.reviewTime,
      notes: clause.notes
    };
  }

  listClauses(documentId: number): ClauseReview[] {
    return this.state.clauses.filter((c) => c.documentId === documentId);
  }

  // ── Analysis aggregator ───────────────────────────────────────────────

  getAnalysis(documentId: number): PrivacyAnalysis | null {
    return this.state.analyses.find((a) => a.documentId === documentId) ?? null;
  }

  getAnalysisStatus(documentId: number): { analysisComplete: boolean } | Rejection {
    const document = this.requireDocument(documentId);
    if ("error" in document) return document;
    return { analysisComplete: this.getAnalysis(document.id)?.analysisComplete ?? false };
  }

  completeAnalysis(input: AnalysisInput & { reviewer: ActorAddress; documentId: number }) {
    const reviewer = normalizeAddress(input.reviewer);
    if (!isReviewer(this.state, reviewer)) return reject(ERROR_CODES.callerUnauthorized, "Not authorized reviewer");
    const document = this.requireDocument(input.documentId);
    if ("error" in document) return document;
    const invalid = validateAnalysisInput(input);
    if (invalid) return reject(ERROR_CODES.outOfRange, invalid);
    const analysis = this.getAnalysis(document.id);
    if (!analysis) return reject(ERROR_CODES.documentNotFound, "Analysis record missing for document");
    if (analysis.analysisComplete) return reject(ERROR_CODES.alreadyCompleted, "Analysis already completed");

    const aggregate = aggregateAnalysis(input);
    const readers = [reviewer, document.submitter];
    document.sealedScore = this.seal(aggregate.sealedScorePlaintext, ...readers);
    document.sealedRisk = this.seal(aggregate.overallRisk, ...readers);
    document.isReviewed = true;
    analysis.sealedDataSensitivity = this.seal(input.dataSensitivity, reviewer);
    analysis.sealedGdprCompliance = this.seal(input.gdprCompliance, reviewer);
    analysis.sealedCcpaCompliance = this.seal(input.ccpaCompliance, reviewer);
    analysis.sealedRetentionRisk = this.seal(input.retentionRisk, reviewer);
    analysis.sealedSharingRisk = this.seal(input.sharingRisk, reviewer);
    analysis.analysisComplete = true;
    analysis.analyzedBy = reviewer;
    analysis.completedAt = nowIso();

    this.emit({ type: "AnalysisCompleted", documentId: document.id, reviewer });
    if (aggregate.alert) {
      this.emit({ type: "ComplianceAlert", documentId: document.id, riskLevel: aggregate.overallRisk });
    }
    return { documentId: document.id, complianceAlert: aggregate.alert, reason: aggregate.reason };
  }

  // ── Decryption request manager ────────────────────────────────────────

  getDecryptionRequest(requestId: string): DecryptionRequest | null {
    return this.state.decryptionRequests.find((r) => r.requestId === requestId) ?? null;
  }

  private requestForDocument(document: DocumentRecord): DecryptionRequest | null {
    return document.decryptionRequestId ? this.getDecryptionRequest(document.decryptionRequestId) : null;
  }

  requestDecryption(input: { caller: ActorAddress; documentId: number }) {
    const caller = normalizeAddress(input.caller);
    const document = this.requireDocument(input.documentId);
    if ("error" in document) return document;
    if (!isSubmitterOrReviewer(this.state, document, caller)) return reject(ERROR_CODES.callerUnauthorized, "Not authorized to request decryption");
    if (!document.isReviewed) return reject(ERROR_CODES.notYetReviewed, "Document not yet reviewed");
    if (document.refundProcessed) return reject(ERROR_CODES.alreadyRefunded, "Refund already processed");
    if (document.decryptionRequestId) return reject(ERROR_CODES.alreadyRequested, "Decryption already requested");

    const { encryptor, gateway } = this.collaborators;
    const handles = [encryptor.toOpaqueHandle(document.sealedScore), encryptor.toOpaqueHandle(document.sealedRisk)];
    const requestId = gateway.requestDecryption(handles, this);
    if (this.getDecryptionRequest(requestId)) {
      gateway.cancel(requestId);
      return reject(ERROR_CODES.invalidRequest, "Gateway issued a duplicate request id");
    }

    const request: DecryptionRequest = {
      requestId,
      documentId: document.id,
      requester: caller,
      requestTime: nowIso(),
      state: "pending"
    };
    this.state.decryptionRequests.push(request);
    document.decryptionRequestId = requestId;
    this.emit({ type: "DecryptionRequested", documentId: document.id, requestId, requester: caller });
    return { requestId, documentId: document.id };
  }

  /**
   * Gateway entry point. A callback that arrives after the timeout window is
   * absorbed: the request is marked failed and the caller gets a normal
   * result, never a rejection.
   */
  onDecryptionCallback(requestId: string, cleartextPayload: string, proof: string): CallbackOutcome | Rejection {
    const request = this.getDecryptionRequest(requestId);
    if (!request) return reject(ERROR_CODES.invalidRequest, "Invalid request ID");
    if (request.state === "completed") return reject(ERROR_CODES.alreadyCompleted, "Decryption already completed");
    const document = this.getDocument(request.documentId);
    if (!document) return reject(ERROR_CODES.invalidRequest, "Request references an unknown document");
    if (document.refundProcessed) return reject(ERROR_CODES.alreadyRefunded, "Refund already processed");
    if (!this.collaborators.gateway.checkSignatures(requestId, cleartextPayload, proof)) {
      return reject(ERROR_CODES.invalidProof, "Decryption proof verification failed");
    }

    if (isRequestStale(request, this.decryptionTimeoutMs)) {
      if (request.state !== "failed") {
        request.state = "failed";
        request.failureCause = "timeout";
        request.resolvedAt = nowIso();
        this.emit({ type: "DecryptionFailed", documentId: document.id, requestId, reason: TIMEOUT_FAILURE_REASON });
      }
      return { outcome: "failed", documentId: document.id, requestId, reason: TIMEOUT_FAILURE_REASON };
    }

    const decoded = decodeScoreAndRisk(cleartextPayload);
    if (!decoded) return reject(ERROR_CODES.invalidInput, "Malformed cleartext payload");

    request.decryptedScore = decoded.score;
    request.decryptedRiskLevel = decoded.riskLevel;
    request.state = "completed";
    request.resolvedAt = nowIso();
    document.decryptionCompleted = true;
    this.emit({ type: "DecryptionCompleted", documentId: document.id, requestId, score: decoded.score, riskLevel: decoded.riskLevel });
    return { outcome: "completed", documentId: document.id, requestId, score: decoded.score, riskLevel: decoded.riskLevel };
  }

  getDecryptionStatus(documentId: number): { status: DecryptionStatus | null } | Rejection {
    const document = this.requireDocument(documentId);
    if ("error" in document) return document;
    const request = this.requestForDocument(document);
    if (!request) return { status: null };
    const status: DecryptionStatus = {
      requestId: request.requestId,
      state: request.state,
      requester: request.requester,
      requestTime: request.requestTime
    };
    if (request.state === "completed") {
      status.decryptedScore = request.decryptedScore;
      status.decryptedRiskLevel = request.decryptedRiskLevel;
    }
    if (request.failureCause) status.failureCause = request.failureCause;
    return { status };
  }

  // ── Fee custody & refunds ─────────────────────────────────────────────

  private planRefund(document: DocumentRecord): RefundPlan | Rejection {
    if (document.refundProcessed) return reject(ERROR_CODES.alreadyRefunded, "Refund already processed");
    const request = this.requestForDocument(document);
    if (!request) return reject(ERROR_CODES.noRequestFound, "No decryption request found");
    if (request.state === "completed") return reject(ERROR_CODES.alreadyCompleted, "Decryption already completed");
    const eligibility = evaluateRefundEligibility({ document, request, timeoutMs: this.decryptionTimeoutMs });
    if (!eligibility.eligible) return reject(ERROR_CODES.notEligibleForRefund, "Refund conditions not met");
    const amount = toAmount(document.feeEscrowed);
    if (amount <= 0n) return reject(ERROR_CODES.noFunds, "Escrowed fee was already released to the platform");
    return { document, request, eligibility, amount };
  }

  canClaimRefund(documentId: number): boolean {
    const document = this.getDocument(documentId);
    if (!document) return false;
    return !("error" in this.planRefund(document));
  }

  claimRefund(input: { caller: ActorAddress; documentId: number }) {
    const caller = normalizeAddress(input.caller);
    const document = this.requireDocument(input.documentId);
    if ("error" in document) return document;
    if (document.submitter !== caller) return reject(ERROR_CODES.callerUnauthorized, "Only submitter can claim refund");
    const plan = this.planRefund(document);
    if ("error" in plan) return plan;
    if (toAmount(this.state.platformFunds) < plan.amount) return reject(ERROR_CODES.transferFailed, "Platform funds cannot cover the refund");
    if (!this.collaborators.treasury.transfer(document.submitter, plan.amount)) {
      return reject(ERROR_CODES.transferFailed, "Refund transfer failed");
    }

    const refundedAt = nowIso();
    const amount = formatAmount(plan.amount);
    document.refundProcessed = true;
    document.refundedAt = refundedAt;
    document.feeEscrowed = "0";
    plan.request.state = "failed";
    plan.request.failureCause ??= plan.eligibility.timedOut ? "timeout" : "refund";
    plan.request.resolvedAt ??= refundedAt;
    this.state.platformFunds = formatAmount(toAmount(this.state.platformFunds) - plan.amount);
    this.state.totalRefunded = formatAmount(toAmount(this.state.totalRefunded) + plan.amount);

    this.emit({ type: "RefundProcessed", documentId: document.id, submitter: document.submitter, amount });
    if (plan.eligibility.timedOut) {
      this.emit({ type: "TimeoutRefundClaimed", documentId: document.id, submitter: document.submitter, amount });
    }
    return { documentId: document.id, amount, timedOut: plan.eligibility.timedOut };
  }

  getRefundStatus(documentId: number) {
    const document = this.requireDocument(documentId);
    if ("error" in document) return document;
    return {
      refundProcessed: document.refundProcessed,
      refundedAt: document.refundedAt ?? null,
      feePaid: document.feePaid,
      feeEscrowed: document.feeEscrowed,
      canClaimRefund: this.canClaimRefund(document.id)
    };
  }

  /** Pending requests of unrefunded documents, with the handles their gateway job needs. */
  listPendingDecryptions(): Array<{ requestId: string; handles: OpaqueHandle[] }> {
    const { encryptor } = this.collaborators;
    return this.state.decryptionRequests.flatMap((request) => {
      const document = this.getDocument(request.documentId);
      if (request.state !== "pending" || !document || document.refundProcessed) return [];
      return [{ requestId: request.requestId, handles: [encryptor.toOpaqueHandle(document.sealedScore), encryptor.toOpaqueHandle(document.sealedRisk)] }];
    });
  }

  listRefundEligibleDocuments(): number[] {
    return this.state.documents.filter((d) => this.canClaimRefund(d.id)).map((d) => d.id);
  }

  /**
   * Owner sweep of the whole balance. Escrow of every unrefunded document is
   * released with it, so a later refund claim on those documents finds
   * nothing to return.
   */
  withdraw(input: { caller: ActorAddress; to: ActorAddress }) {
    const caller = normalizeAddress(input.caller);
    const to = normalizeAddress(input.to);
    if (!isOwner(this.state, caller)) return reject(ERROR_CODES.callerUnauthorized, "Not authorized");
    if (!isActorAddress(to)) return reject(ERROR_CODES.invalidInput, "Recipient address is invalid");
    const amount = toAmount(this.state.platformFunds);
    if (amount === 0n) return reject(ERROR_CODES.noFunds, "No funds to withdraw");
    if (!this.collaborators.treasury.transfer(to, amount)) return reject(ERROR_CODES.transferFailed, "Withdrawal transfer failed");

    const releasedAt = nowIso();
    for (const document of this.state.documents) {
      if (document.refundProcessed || document.feeEscrowed === "0") continue;
      document.feeEscrowed = "0";
      document.feeReleasedAt = releasedAt;
    }
    this.state.platformFunds = "0";
    this.state.totalWithdrawn = formatAmount(toAmount(this.state.totalWithdrawn) + amount);
    this.emit({ type: "FundsWithdrawn", to, amount: formatAmount(amount) });
    return { to, amount: formatAmount(amount) };
  }

  getFundsSummary(): FundsSummary {
    const totalEscrowed = this.state.documents.reduce((sum, d) => sum + toAmount(d.feeEscrowed), 0n);
    return {
      platformFunds: this.state.platformFunds,
      totalEscrowed: formatAmount(totalEscrowed),
      totalRefunded: this.state.totalRefunded,
      totalWithdrawn: this.state.totalWithdrawn
    };
  }

  checkFundsInvariant(): boolean {
    const summary = this.getFundsSummary();
    return summary.platformFunds === summary.totalEscrowed;
  }

  // ── Event log & request nonces ────────────────────────────────────────

  listEvents(filter: { documentId?: number; type?: LedgerEventType; limit?: number } = {}): LedgerEvent[] {
    const matching = this.state.events.filter((event) => {
      if (filter.type && event.type !== filter.type) return false;
      if (filter.documentId !== undefined && !("documentId" in event && event.documentId === filter.documentId)) return false;
      return true;
    });
    return filter.limit ? matching.slice(-filter.limit) : matching;
  }

  recordNonce(actor: ActorAddress, nonce: string) {
    const now = nowIso();
    this.pruneExpiredNonces();
    if (this.state.requestNonces.some((n) => n.actor === actor && n.nonce === nonce)) {
      return false;
    }
    this.state.requestNonces.push({ actor, nonce, createdAt: now, expiresAt: addMs(now, NONCE_TTL_MS) });
    return true;
  }

  pruneExpiredNonces() {
    const nowMs = Date.now();
    this.state.requestNonces = this.state.requestNonces.filter((n) => new Date(n.expiresAt).getTime() > nowMs);
  }
}
