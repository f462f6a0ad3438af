import type { DecryptionCallbackTarget, DecryptionGateway, Encryptor, Treasury } from "../../src/lib/collaborators/types";
import { MIN_REVIEW_FEE_DEFAULT } from "../../src/lib/constants";
import { encodeCleartexts } from "../../src/lib/decryption/codec";
import { isRejection, type Rejection } from "../../src/lib/error-codes";
import { MemoryStore } from "../../src/lib/store/memory";
import type { ActorAddress, OpaqueHandle, SealedValue } from "../../src/lib/types";

export const OWNER = "0x00000000000000000000000000000000000000aa";
export const REVIEWER = "0x00000000000000000000000000000000000000bb";
export const SUBMITTER = "0x00000000000000000000000000000000000000cc";
export const STRANGER = "0x00000000000000000000000000000000000000dd";

export const HOUR_MS = 60 * 60 * 1000;

export class FakeEncryptor implements Encryptor {
  private counter = 0;
  readonly plaintexts = new Map<OpaqueHandle, number>();
  readonly grants: Array<{ handle: OpaqueHandle; actor: ActorAddress }> = [];

  seal(plaintext: number): SealedValue {
    this.counter += 1;
    const handle = `fake-handle-${this.counter}`;
    this.plaintexts.set(handle, plaintext);
    return { kind: "sealed", handle };
  }

  allow(value: SealedValue, actor: ActorAddress): void {
    this.grants.push({ handle: value.handle, actor });
  }

  toOpaqueHandle(value: SealedValue): OpaqueHandle {
    return value.handle;
  }

  plaintextOf(value: SealedValue): number | undefined {
    return this.plaintexts.get(value.handle);
  }

  holdersOf(value: SealedValue): ActorAddress[] {
    return this.grants.filter((g) => g.handle === value.handle).map((g) => g.actor);
  }
}

export class FakeGateway implements DecryptionGateway {
  private counter = 0;
  readonly requests: Array<{ requestId: string; handles: OpaqueHandle[]; target: DecryptionCallbackTarget }> = [];
  readonly cancelled: string[] = [];

  requestDecryption(handles: OpaqueHandle[], target: DecryptionCallbackTarget): string {
    this.counter += 1;
    const requestId = `req-${this.counter}`;
    this.requests.push({ requestId, handles, target });
    return requestId;
  }

  checkSignatures(requestId: string, _cleartextPayload: string, proof: string): boolean {
    return proof === FakeGateway.proofFor(requestId);
  }

  cancel(requestId: string): void {
    const index = this.requests.map((r) => r.requestId).lastIndexOf(requestId);
    if (index >= 0) {
      this.requests.splice(index, 1);
      this.cancelled.push(requestId);
    }
  }

  static proofFor(requestId: string): string {
    return `proof:${requestId}`;
  }
}

export class FakeTreasury implements Treasury {
  failing = false;
  readonly transfers: Array<{ to: ActorAddress; amount: bigint }> = [];

  transfer(to: ActorAddress, amount: bigint): boolean {
    if (this.failing) return false;
    this.transfers.push({ to, amount });
    return true;
  }
}

export function createTestLedger(options: { decryptionTimeoutMs?: number; minReviewFee?: bigint } = {}) {
  const encryptor = new FakeEncryptor();
  const gateway = new FakeGateway();
  const treasury = new FakeTreasury();
  const store = new MemoryStore({
    owner: OWNER,
    collaborators: { encryptor, gateway, treasury },
    decryptionTimeoutMs: options.decryptionTimeoutMs ?? HOUR_MS,
    minReviewFee: options.minReviewFee
  });
  const authorized = store.authorizeReviewer({ caller: OWNER, reviewer: REVIEWER });
  if ("error" in authorized) throw new Error(authorized.error);
  return { store, encryptor, gateway, treasury };
}

export function expectOk<T>(result: T | Rejection): T {
  if (isRejection(result)) throw new Error(`${result.code}: ${result.error}`);
  return result;
}

export function submit(store: MemoryStore, submitter = SUBMITTER, fee = MIN_REVIEW_FEE_DEFAULT) {
  return expectOk(store.submitDocument({ submitter, documentHash: "Qm-test-hash", publicTitle: "Test policy", fee })).documentId;
}

export function submitReviewed(store: MemoryStore, submitter = SUBMITTER, fee = MIN_REVIEW_FEE_DEFAULT) {
  const documentId = submit(store, submitter, fee);
  expectOk(
    store.completeAnalysis({
      reviewer: REVIEWER,
      documentId,
      dataSensitivity: 40,
      gdprCompliance: 8,
      ccpaCompliance: 7,
      retentionRisk: 2,
      sharingRisk: 3
    })
  );
  return documentId;
}

export function scoreRiskPayload(score: number, riskLevel: number): string {
  return encodeCleartexts([score, riskLevel]);
}
