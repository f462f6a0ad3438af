import { getRuntime, persistRuntimeStore } from "@/lib/store/runtime";
import { nowIso } from "@/lib/utils";

/** Delivers every queued local-gateway decryption back into the ledger. */
export async function runGatewayRelayJob() {
  const { store, gateway } = await getRuntime();
  const results = gateway.relay();
  if (results.length) {
    await persistRuntimeStore(store);
  }
  return {
    job: "gateway-relay",
    executedAt: nowIso(),
    delivered: results.filter((r) => r.status === "delivered").length,
    failed: results.filter((r) => r.status === "failed").length,
    results
  };
}

export async function runRefundEligibilityReportJob() {
  const { store } = await getRuntime();
  const eligible = store.listRefundEligibleDocuments().map((documentId) => {
    const status = store.getDecryptionStatus(documentId);
    const request = "error" in status ? null : status.status;
    return {
      documentId,
      requestId: request?.requestId ?? null,
      requestTime: request?.requestTime ?? null,
      state: request?.state ?? null
    };
  });
  return { job: "refund-eligibility", executedAt: nowIso(), eligible, funds: store.getFundsSummary() };
}
