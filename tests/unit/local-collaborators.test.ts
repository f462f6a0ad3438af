import { describe, expect, it } from "vitest";
import { LocalEncryptor } from "../../src/lib/collaborators/local-encryptor";
import { LocalDecryptionGateway } from "../../src/lib/collaborators/local-gateway";
import { LocalTreasury } from "../../src/lib/collaborators/local-treasury";
import { encodeCleartexts } from "../../src/lib/decryption/codec";
import { MemoryStore } from "../../src/lib/store/memory";
import { OWNER, REVIEWER, SUBMITTER, expectOk, submitReviewed } from "./fixtures";

function localLedger() {
  const encryptor = new LocalEncryptor(Buffer.alloc(32, 1));
  const gateway = new LocalDecryptionGateway(encryptor, Buffer.alloc(32, 2));
  const treasury = new LocalTreasury();
  const store = new MemoryStore({ owner: OWNER, collaborators: { encryptor, gateway, treasury } });
  expectOk(store.authorizeReviewer({ caller: OWNER, reviewer: REVIEWER }));
  return { store, encryptor, gateway, treasury };
}

describe("local encryptor", () => {
  it("seals uint32 values behind authenticated ciphertext handles", () => {
    const encryptor = new LocalEncryptor(Buffer.alloc(32, 1));
    const first = encryptor.seal(42);
    const second = encryptor.seal(42);

    expect(first.handle.startsWith("sealed:v1:")).toBe(true);
    expect(first.handle).not.toBe(second.handle);
    expect(encryptor.open(encryptor.toOpaqueHandle(first))).toBe(42);
    expect(() => encryptor.seal(-1)).toThrow("Sealed values must be uint32");
  });

  it("refuses handles sealed under another key", () => {
    const sealed = new LocalEncryptor(Buffer.alloc(32, 1)).seal(5);
    expect(() => new LocalEncryptor(Buffer.alloc(32, 9)).open(sealed.handle)).toThrow();
    expect(() => new LocalEncryptor(Buffer.alloc(16))).toThrow("AES-256 requires a 32-byte key");
  });

  it("tracks capability grants per handle", () => {
    const encryptor = new LocalEncryptor(Buffer.alloc(32, 1));
    const sealed = encryptor.seal(1);
    encryptor.allow(sealed, SUBMITTER);
    expect(encryptor.isAllowed(sealed, SUBMITTER)).toBe(true);
    expect(encryptor.isAllowed(sealed, REVIEWER)).toBe(false);
  });
});

describe("local decryption gateway", () => {
  it("relays a queued request back into the ledger with a verifiable proof", () => {
    const { store, gateway } = localLedger();
    submitReviewed(store);
    const { requestId } = expectOk(store.requestDecryption({ caller: SUBMITTER, documentId: 1 }));
    expect(gateway.pendingRequestIds()).toEqual([requestId]);

    const results = gateway.relay();

    expect(results).toEqual([
      {
        requestId,
        status: "delivered",
        outcome: { outcome: "completed", documentId: 1, requestId, score: 70, riskLevel: 2 }
      }
    ]);
    expect(gateway.pendingRequestIds()).toEqual([]);
    expect(store.getDecryptionRequest(requestId)?.decryptedScore).toBe(70);
  });

  it("only accepts proofs it signed for the exact payload", () => {
    const { gateway } = localLedger();
    const payload = encodeCleartexts([70, 2]);
    const proof = gateway.sign("dec_1", payload);

    expect(gateway.checkSignatures("dec_1", payload, proof)).toBe(true);
    expect(gateway.checkSignatures("dec_1", encodeCleartexts([90, 1]), proof)).toBe(false);
    expect(gateway.checkSignatures("dec_2", payload, proof)).toBe(false);
    expect(gateway.checkSignatures("dec_1", payload, "not-a-signature")).toBe(false);
  });

  it("reports jobs whose handles cannot be opened", () => {
    const { store, gateway } = localLedger();
    const requestId = gateway.requestDecryption(["bogus"], store);

    expect(gateway.relay()).toEqual([{ requestId, status: "failed", message: "Unknown sealed handle format" }]);
  });

  it("cancels only the latest job registered under an id", () => {
    const { store, gateway } = localLedger();
    gateway.resume("dec_same", ["first"], store);
    gateway.resume("dec_same", ["second"], store);
    const other = gateway.requestDecryption(["third"], store);

    gateway.cancel("dec_same");
    gateway.cancel("dec_unknown");

    expect(gateway.pendingRequestIds()).toEqual(["dec_same", other]);
    expect(gateway.relay().map((result) => result.message)).toEqual(["Unknown sealed handle format", "Unknown sealed handle format"]);
  });
});

describe("local treasury", () => {
  it("records positive payouts and refuses empty ones", () => {
    const treasury = new LocalTreasury();
    expect(treasury.transfer(SUBMITTER, 0n)).toBe(false);
    expect(treasury.transfer(SUBMITTER, 5n)).toBe(true);
    expect(treasury.payouts).toMatchObject([{ to: SUBMITTER, amount: "5" }]);
  });
});
