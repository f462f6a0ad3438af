import type { DecryptionRequest, DocumentRecord } from "@/lib/types";

export interface RefundEligibility {
  eligible: boolean;
  timedOut: boolean;
  failed: boolean;
}

export function isRequestStale(request: Pick<DecryptionRequest, "requestTime">, timeoutMs: number, now = Date.now()): boolean {
  return now > new Date(request.requestTime).getTime() + timeoutMs;
}

/**
 * Refund rule shared by `claimRefund` and `canClaimRefund`. Either branch
 * suffices; `timedOut` only decides whether the timeout event is emitted.
 */
export function evaluateRefundEligibility(params: {
  document: Pick<DocumentRecord, "decryptionCompleted">;
  request: Pick<DecryptionRequest, "requestTime" | "state">;
  timeoutMs: number;
  now?: number;
}): RefundEligibility {
  const timedOut = isRequestStale(params.request, params.timeoutMs, params.now);
  const failed = !params.document.decryptionCompleted && params.request.state !== "completed";
  return { eligible: timedOut || failed, timedOut, failed };
}
