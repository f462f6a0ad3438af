import { createPrivateKey, createPublicKey, sign, timingSafeEqual, verify, type KeyObject } from "node:crypto";
import { sha256Hex } from "@/lib/utils";
import type { ActorAddress } from "@/lib/types";

const ED25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");
const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

function base64UrlEncode(buf: Buffer): string {
  return buf.toString("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/g, "");
}

function decodeMaybeHexOrBase64(input: string): Buffer {
  const trimmed = input.trim();
  if (/^[0-9a-fA-F]+$/.test(trimmed) && trimmed.length % 2 === 0) {
    return Buffer.from(trimmed, "hex");
  }
  return Buffer.from(trimmed, "base64");
}

function createEd25519KeyObject(publicKey: string) {
  const trimmed = publicKey.trim();
  if (trimmed.includes("BEGIN PUBLIC KEY")) {
    return createPublicKey(trimmed);
  }

  const raw = decodeMaybeHexOrBase64(trimmed);
  if (raw.length !== 32) {
    throw new Error("Ed25519 public key must be PEM or raw 32-byte key (hex/base64)");
  }

  return createPublicKey({
    key: {
      kty: "OKP",
      crv: "Ed25519",
      x: base64UrlEncode(raw)
    },
    format: "jwk"
  });
}

export function ed25519PrivateKeyFromSeed(seed: Buffer): KeyObject {
  if (seed.length !== 32) {
    throw new Error("Ed25519 seed must be 32 bytes");
  }
  return createPrivateKey({ key: Buffer.concat([ED25519_PKCS8_PREFIX, seed]), format: "der", type: "pkcs8" });
}

export function rawPublicKeyHex(privateKey: KeyObject): string {
  const jwk = createPublicKey(privateKey).export({ format: "jwk" });
  if (typeof jwk.x !== "string") {
    throw new Error("Ed25519 public key export failed");
  }
  return Buffer.from(jwk.x, "base64url").toString("hex");
}

export function signEd25519(privateKey: KeyObject, message: string): string {
  return sign(null, Buffer.from(message, "utf8"), privateKey).toString("hex");
}

export function verifyEd25519Signature(params: {
  publicKey: string;
  message: string;
  signature: string;
}): boolean {
  const key = createEd25519KeyObject(params.publicKey);
  const sig = decodeMaybeHexOrBase64(params.signature);
  return verify(null, Buffer.from(params.message, "utf8"), key, sig);
}

export function normalizeAddress(address: string): ActorAddress {
  return address.trim().toLowerCase();
}

export function isActorAddress(address: string): boolean {
  return ADDRESS_PATTERN.test(normalizeAddress(address));
}

/** Self-certifying address: `0x` + the last 20 bytes of sha256(raw public key). */
export function deriveActorAddress(publicKeyHex: string): ActorAddress {
  const raw = decodeMaybeHexOrBase64(publicKeyHex);
  if (raw.length !== 32) {
    throw new Error("Actor key must be a raw 32-byte Ed25519 public key");
  }
  return `0x${sha256Hex(raw).slice(-40)}`;
}

export interface SignedRequestHeaders {
  actorKey: string;
  timestamp: string;
  nonce: string;
  signature: string;
}

export function parseSignedHeaders(headers: Headers): SignedRequestHeaders | null {
  const actorKey = headers.get("x-actor-key");
  const timestamp = headers.get("x-timestamp");
  const nonce = headers.get("x-nonce");
  const signature = headers.get("x-signature");
  if (!actorKey || !timestamp || !nonce || !signature) {
    return null;
  }
  return { actorKey, timestamp, nonce, signature };
}

export function canonicalizeSignedRequest(input: {
  method: string;
  pathname: string;
  timestamp: string;
  nonce: string;
  bodyText: string;
}): string {
  const bodyHash = sha256Hex(input.bodyText || "");
  return [
    input.method.toUpperCase(),
    input.pathname,
    input.timestamp,
    input.nonce,
    bodyHash
  ].join("\n");
}

export function verifySignedRequest(params: {
  method: string;
  pathname: string;
  headers: SignedRequestHeaders;
  bodyText: string;
}): boolean {
  const message = canonicalizeSignedRequest({
    method: params.method,
    pathname: params.pathname,
    timestamp: params.headers.timestamp,
    nonce: params.headers.nonce,
    bodyText: params.bodyText
  });
  return verifyEd25519Signature({
    publicKey: params.headers.actorKey,
    message,
    signature: params.headers.signature
  });
}

export function canonicalizeDecryptionProof(requestId: string, cleartextPayload: string): string {
  return ["sealed-review-decryption", `request_id=${requestId}`, `payload=${cleartextPayload}`].join("\n");
}

export function safeEqual(a: string, b: string): boolean {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  if (ab.length !== bb.length) return false;
  return timingSafeEqual(ab, bb);
}
