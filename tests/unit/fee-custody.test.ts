import { describe, expect, it } from "vitest";
import { MIN_REVIEW_FEE_DEFAULT } from "../../src/lib/constants";
import { MemoryStore } from "../../src/lib/store/memory";
import { OWNER, REVIEWER, STRANGER, SUBMITTER, createTestLedger, expectOk, submit, submitReviewed } from "./fixtures";

const FEE = MIN_REVIEW_FEE_DEFAULT;

describe("fee custody", () => {
  it("keeps platform funds equal to the escrowed fees across submissions and refunds", () => {
    const { store } = createTestLedger();
    submitReviewed(store, SUBMITTER, FEE);
    submit(store, STRANGER, FEE * 2n);

    expect(store.getFundsSummary()).toEqual({
      platformFunds: "3000000000000000",
      totalEscrowed: "3000000000000000",
      totalRefunded: "0",
      totalWithdrawn: "0"
    });
    expect(store.checkFundsInvariant()).toBe(true);

    expectOk(store.requestDecryption({ caller: SUBMITTER, documentId: 1 }));
    expectOk(store.claimRefund({ caller: SUBMITTER, documentId: 1 }));

    expect(store.getFundsSummary()).toEqual({
      platformFunds: "2000000000000000",
      totalEscrowed: "2000000000000000",
      totalRefunded: "1000000000000000",
      totalWithdrawn: "0"
    });
    expect(store.checkFundsInvariant()).toBe(true);
  });

  it("withdraws the whole balance to the owner's chosen recipient", () => {
    const { store, treasury } = createTestLedger();
    submit(store, SUBMITTER, FEE);
    submit(store, STRANGER, FEE * 2n);

    expect(store.withdraw({ caller: REVIEWER, to: REVIEWER })).toEqual({ code: "CALLER_UNAUTHORIZED", error: "Not authorized" });
    expect(store.withdraw({ caller: OWNER, to: "nowhere" })).toMatchObject({ code: "INVALID_INPUT" });

    const withdrawal = expectOk(store.withdraw({ caller: OWNER, to: STRANGER }));
    expect(withdrawal).toEqual({ to: STRANGER, amount: "3000000000000000" });
    expect(treasury.transfers).toEqual([{ to: STRANGER, amount: FEE * 3n }]);
    expect(store.getFundsSummary()).toEqual({
      platformFunds: "0",
      totalEscrowed: "0",
      totalRefunded: "0",
      totalWithdrawn: "3000000000000000"
    });
    expect(store.checkFundsInvariant()).toBe(true);
    expect(store.getDocument(2)?.feeEscrowed).toBe("0");
    expect(store.getDocument(2)?.feePaid).toBe("2000000000000000");
    expect(store.getDocument(2)?.feeReleasedAt).toBeDefined();
    expect(store.listEvents({ type: "FundsWithdrawn" })).toMatchObject([{ to: STRANGER, amount: "3000000000000000" }]);

    expect(store.withdraw({ caller: OWNER, to: OWNER })).toEqual({ code: "NO_FUNDS", error: "No funds to withdraw" });
  });

  it("has nothing to refund once the escrow has been withdrawn", () => {
    const { store, treasury } = createTestLedger();
    submitReviewed(store);
    expectOk(store.requestDecryption({ caller: SUBMITTER, documentId: 1 }));
    expectOk(store.withdraw({ caller: OWNER, to: OWNER }));

    expect(store.canClaimRefund(1)).toBe(false);
    expect(store.claimRefund({ caller: SUBMITTER, documentId: 1 })).toMatchObject({ code: "NO_FUNDS" });
    expect(treasury.transfers).toHaveLength(1);
  });

  it("leaves state untouched when a refund transfer fails", () => {
    const { store, treasury } = createTestLedger();
    submitReviewed(store);
    expectOk(store.requestDecryption({ caller: SUBMITTER, documentId: 1 }));
    const before = store.snapshotState();

    treasury.failing = true;
    expect(store.claimRefund({ caller: SUBMITTER, documentId: 1 })).toEqual({
      code: "TRANSFER_FAILED",
      error: "Refund transfer failed"
    });
    expect(store.snapshotState()).toEqual(before);

    treasury.failing = false;
    expect(expectOk(store.claimRefund({ caller: SUBMITTER, documentId: 1 })).amount).toBe("1000000000000000");
  });

  it("leaves state untouched when a withdrawal transfer fails", () => {
    const { store, treasury } = createTestLedger();
    submit(store);
    const before = store.snapshotState();

    treasury.failing = true;
    expect(store.withdraw({ caller: OWNER, to: OWNER })).toMatchObject({ code: "TRANSFER_FAILED" });
    expect(store.snapshotState()).toEqual(before);
  });

  it("restores a ledger from a snapshot", () => {
    const first = createTestLedger();
    submitReviewed(first.store);
    expectOk(first.store.requestDecryption({ caller: SUBMITTER, documentId: 1 }));

    const restored = new MemoryStore(
      { owner: STRANGER, collaborators: { encryptor: first.encryptor, gateway: first.gateway, treasury: first.treasury } },
      first.store.snapshotState()
    );

    expect(restored.owner()).toBe(OWNER);
    expect(restored.getTotalDocuments()).toBe(1);
    expect(restored.getFundsSummary()).toEqual(first.store.getFundsSummary());
    expect(restored.requestDecryption({ caller: SUBMITTER, documentId: 1 })).toMatchObject({ code: "ALREADY_REQUESTED" });
    expect(restored.canClaimRefund(1)).toBe(true);
  });
});
