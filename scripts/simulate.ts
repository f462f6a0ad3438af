import { randomBytes } from "node:crypto";
import { LocalEncryptor } from "../src/lib/collaborators/local-encryptor";
import { LocalDecryptionGateway } from "../src/lib/collaborators/local-gateway";
import { LocalTreasury } from "../src/lib/collaborators/local-treasury";
import { MIN_REVIEW_FEE_DEFAULT } from "../src/lib/constants";
import { isRejection, type Rejection } from "../src/lib/error-codes";
import { MemoryStore } from "../src/lib/store/memory";

const OWNER = "0x00000000000000000000000000000000000000a1";
const REVIEWER = "0x00000000000000000000000000000000000000b2";
const SUBMITTER = "0x00000000000000000000000000000000000000c3";
const SECOND_SUBMITTER = "0x00000000000000000000000000000000000000d4";

function unwrap<T>(step: string, result: T | Rejection): T {
  if (isRejection(result)) {
    throw new Error(`${step} rejected: ${result.code} ${result.error}`);
  }
  return result;
}

function main() {
  const encryptor = new LocalEncryptor(randomBytes(32));
  const gateway = new LocalDecryptionGateway(encryptor, randomBytes(32));
  const treasury = new LocalTreasury();
  const store = new MemoryStore({ owner: OWNER, collaborators: { encryptor, gateway, treasury } });

  unwrap("authorizeReviewer", store.authorizeReviewer({ caller: OWNER, reviewer: REVIEWER }));

  // Happy path: review, analysis, decryption delivered by the gateway.
  const first = unwrap(
    "submitDocument",
    store.submitDocument({
      submitter: SUBMITTER,
      documentHash: "bafy-simulated-policy-1",
      publicTitle: "Customer Privacy Policy",
      fee: MIN_REVIEW_FEE_DEFAULT
    })
  );
  unwrap(
    "addClause",
    store.addClause({
      reviewer: REVIEWER,
      documentId: first.documentId,
      clauseType: "data-retention",
      compliance: 8,
      sensitivity: 3,
      notes: "Retention period stated"
    })
  );
  const analysis = unwrap(
    "completeAnalysis",
    store.completeAnalysis({
      reviewer: REVIEWER,
      documentId: first.documentId,
      dataSensitivity: 70,
      gdprCompliance: 3,
      ccpaCompliance: 4,
      retentionRisk: 4,
      sharingRisk: 5
    })
  );
  unwrap("requestDecryption", store.requestDecryption({ caller: SUBMITTER, documentId: first.documentId }));
  const relayed = gateway.relay();

  // Lost callback: the second submitter recovers the fee.
  const second = unwrap(
    "submitDocument",
    store.submitDocument({
      submitter: SECOND_SUBMITTER,
      documentHash: "bafy-simulated-policy-2",
      publicTitle: "Vendor Data Processing Addendum",
      fee: MIN_REVIEW_FEE_DEFAULT * 2n
    })
  );
  unwrap(
    "completeAnalysis",
    store.completeAnalysis({
      reviewer: REVIEWER,
      documentId: second.documentId,
      dataSensitivity: 20,
      gdprCompliance: 9,
      ccpaCompliance: 9,
      retentionRisk: 1,
      sharingRisk: 2
    })
  );
  unwrap("requestDecryption", store.requestDecryption({ caller: SECOND_SUBMITTER, documentId: second.documentId }));
  const refund = unwrap("claimRefund", store.claimRefund({ caller: SECOND_SUBMITTER, documentId: second.documentId }));
  const lateDelivery = gateway.relay();

  const withdrawal = unwrap("withdraw", store.withdraw({ caller: OWNER, to: OWNER }));

  console.log(
    JSON.stringify(
      {
        complianceAlert: analysis.complianceAlert,
        alertReason: analysis.reason,
        relayed,
        refund,
        lateDelivery,
        withdrawal,
        funds: store.getFundsSummary(),
        fundsInvariantHolds: store.checkFundsInvariant(),
        payouts: treasury.payouts,
        events: store.listEvents().map((event) => `${event.sequence} ${event.type}`)
      },
      null,
      2
    )
  );
}

try {
  main();
} catch (error) {
  console.error(error);
  process.exit(1);
}
