import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import type { Encryptor } from "@/lib/collaborators/types";
import type { ActorAddress, OpaqueHandle, SealedValue } from "@/lib/types";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const HANDLE_PREFIX = "sealed:v1:";
const AAD = Buffer.from("sealed-review/uint32", "utf8");

/**
 * AES-256-GCM sealing for single-node deployments. The handle is the
 * ciphertext itself, so sealed values survive a state snapshot without a
 * separate vault.
 */
export class LocalEncryptor implements Encryptor {
  private readonly grants = new Map<OpaqueHandle, Set<ActorAddress>>();

  constructor(private readonly key: Buffer) {
    if (key.length !== 32) {
      throw new Error("AES-256 requires a 32-byte key");
    }
  }

  seal(plaintext: number): SealedValue {
    if (!Number.isInteger(plaintext) || plaintext < 0 || plaintext > 0xffffffff) {
      throw new Error("Sealed values must be uint32");
    }
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: AUTH_TAG_LENGTH });
    cipher.setAAD(AAD);
    const body = Buffer.alloc(4);
    body.writeUInt32BE(plaintext);
    const encrypted = Buffer.concat([cipher.update(body), cipher.final()]);
    const handle = `${HANDLE_PREFIX}${[iv, cipher.getAuthTag(), encrypted].map((part) => part.toString("base64url")).join(".")}`;
    return { kind: "sealed", handle };
  }

  allow(value: SealedValue, actor: ActorAddress): void {
    const holders = this.grants.get(value.handle) ?? new Set<ActorAddress>();
    holders.add(actor);
    this.grants.set(value.handle, holders);
  }

  isAllowed(value: SealedValue, actor: ActorAddress): boolean {
    return this.grants.get(value.handle)?.has(actor) ?? false;
  }

  toOpaqueHandle(value: SealedValue): OpaqueHandle {
    return value.handle;
  }

  /** Only the local gateway calls this; the core has no path to plaintext. */
  open(handle: OpaqueHandle): number {
    if (!handle.startsWith(HANDLE_PREFIX)) {
      throw new Error("Unknown sealed handle format");
    }
    const parts = handle.slice(HANDLE_PREFIX.length).split(".");
    if (parts.length !== 3) {
      throw new Error("Malformed sealed handle");
    }
    const [iv, authTag, encrypted] = parts.map((part) => Buffer.from(part, "base64url"));
    const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAAD(AAD);
    decipher.setAuthTag(authTag);
    const body = Buffer.concat([decipher.update(encrypted), decipher.final()]);
    return body.readUInt32BE(0);
  }
}
