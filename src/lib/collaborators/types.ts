import type { ActorAddress, OpaqueHandle, SealedValue } from "@/lib/types";

export interface Encryptor {
  seal(plaintext: number): SealedValue;
  /** Grants `actor` a capability reference to the sealed value. */
  allow(value: SealedValue, actor: ActorAddress): void;
  toOpaqueHandle(value: SealedValue): OpaqueHandle;
}

export interface DecryptionCallbackTarget {
  onDecryptionCallback(requestId: string, cleartextPayload: string, proof: string): unknown;
}

export interface DecryptionGateway {
  /**
   * Registers a decryption job and returns its request id immediately. The
   * result, if it ever comes, arrives as a separate call on `target`.
   */
  requestDecryption(handles: OpaqueHandle[], target: DecryptionCallbackTarget): string;
  checkSignatures(requestId: string, cleartextPayload: string, proof: string): boolean;
  /** Drops the most recently registered job for `requestId`, if it is still waiting. */
  cancel(requestId: string): void;
}

export interface Treasury {
  /** Moves `amount` base units to `to`; false when the transfer did not happen. */
  transfer(to: ActorAddress, amount: bigint): boolean;
}

export interface Collaborators {
  encryptor: Encryptor;
  gateway: DecryptionGateway;
  treasury: Treasury;
}
