import type { KeyObject } from "node:crypto";
import type { DecryptionCallbackTarget, DecryptionGateway } from "@/lib/collaborators/types";
import type { LocalEncryptor } from "@/lib/collaborators/local-encryptor";
import { encodeCleartexts } from "@/lib/decryption/codec";
import {
  canonicalizeDecryptionProof,
  ed25519PrivateKeyFromSeed,
  rawPublicKeyHex,
  signEd25519,
  verifyEd25519Signature
} from "@/lib/protocol/signatures";
import type { OpaqueHandle } from "@/lib/types";
import { nowIso, randomId } from "@/lib/utils";

interface QueuedDecryption {
  requestId: string;
  handles: OpaqueHandle[];
  target: DecryptionCallbackTarget;
  queuedAt: string;
}

export interface RelayResult {
  requestId: string;
  status: "delivered" | "failed";
  outcome?: unknown;
  message?: string;
}

/**
 * In-process stand-in for the decryption gateway. Jobs wait in a queue until
 * `relay()` runs (the gateway-relay job); results are signed with the
 * gateway's Ed25519 key so the callback path verifies them like any other.
 */
export class LocalDecryptionGateway implements DecryptionGateway {
  private readonly queue: QueuedDecryption[] = [];
  private readonly privateKey: KeyObject;
  readonly publicKey: string;

  constructor(private readonly encryptor: LocalEncryptor, seed: Buffer) {
    this.privateKey = ed25519PrivateKeyFromSeed(seed);
    this.publicKey = rawPublicKeyHex(this.privateKey);
  }

  requestDecryption(handles: OpaqueHandle[], target: DecryptionCallbackTarget): string {
    const requestId = randomId("dec");
    this.queue.push({ requestId, handles: [...handles], target, queuedAt: nowIso() });
    return requestId;
  }

  /** Re-queues a request that was pending when the ledger was last saved. */
  resume(requestId: string, handles: OpaqueHandle[], target: DecryptionCallbackTarget): void {
    this.queue.push({ requestId, handles: [...handles], target, queuedAt: nowIso() });
  }

  cancel(requestId: string): void {
    for (let i = this.queue.length - 1; i >= 0; i -= 1) {
      if (this.queue[i].requestId === requestId) {
        this.queue.splice(i, 1);
        return;
      }
    }
  }

  checkSignatures(requestId: string, cleartextPayload: string, proof: string): boolean {
    try {
      return verifyEd25519Signature({
        publicKey: this.publicKey,
        message: canonicalizeDecryptionProof(requestId, cleartextPayload),
        signature: proof
      });
    } catch {
      // Undecodable proof bytes count as a bad proof.
      return false;
    }
  }

  sign(requestId: string, cleartextPayload: string): string {
    return signEd25519(this.privateKey, canonicalizeDecryptionProof(requestId, cleartextPayload));
  }

  pendingRequestIds(): string[] {
    return this.queue.map((job) => job.requestId);
  }

  relay(): RelayResult[] {
    const jobs = this.queue.splice(0, this.queue.length);
    const results: RelayResult[] = [];
    for (const job of jobs) {
      try {
        const payload = encodeCleartexts(job.handles.map((handle) => this.encryptor.open(handle)));
        const outcome = job.target.onDecryptionCallback(job.requestId, payload, this.sign(job.requestId, payload));
        results.push({ requestId: job.requestId, status: "delivered", outcome });
      } catch (error) {
        const message = error instanceof Error ? error.message : "decryption relay failed";
        results.push({ requestId: job.requestId, status: "failed", message });
      }
    }
    return results;
  }
}
