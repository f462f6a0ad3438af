import { z } from "zod";
import {
  DECRYPTION_TIMEOUT_MS_DEFAULT,
  MIN_REVIEW_FEE_DEFAULT,
  SIGNATURE_MAX_SKEW_MS_DEFAULT
} from "@/lib/constants";

export type BackendMode = "memory" | "postgres";

const hex32 = z.string().regex(/^[0-9a-fA-F]{64}$/, "must be 32 bytes of hex");

const envSchema = z.object({
  SEALED_REVIEW_STATE_BACKEND: z.enum(["memory", "postgres", ""]).default(""),
  DATABASE_URL: z.string().optional(),
  SEALED_REVIEW_OWNER_ADDRESS: z.string().optional(),
  ENCRYPTOR_KEY: hex32.optional(),
  GATEWAY_SIGNING_SEED: hex32.optional(),
  DECRYPTION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  MIN_REVIEW_FEE: z.string().regex(/^\d+$/).optional(),
  SIGNATURE_MAX_SKEW_MS: z.coerce.number().int().positive().optional(),
  ALLOW_UNSIGNED_DEV: z.string().optional(),
  INTERNAL_JOB_TOKEN: z.string().optional(),
  NODE_ENV: z.string().optional()
});

export type RawEnv = z.infer<typeof envSchema>;

function readEnv(): RawEnv {
  // Blank variables count as unset.
  const present = Object.fromEntries(Object.entries(process.env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const parsed = envSchema.safeParse({
    ...present,
    SEALED_REVIEW_STATE_BACKEND: (process.env.SEALED_REVIEW_STATE_BACKEND || "").trim().toLowerCase()
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export function getStateBackendMode(): BackendMode {
  const env = readEnv();
  const isTest = env.NODE_ENV === "test";

  if (env.SEALED_REVIEW_STATE_BACKEND === "postgres") {
    if (!env.DATABASE_URL) {
      throw new Error("SEALED_REVIEW_STATE_BACKEND=postgres requires DATABASE_URL");
    }
    return "postgres";
  }
  if (env.SEALED_REVIEW_STATE_BACKEND === "memory") return "memory";
  if (isTest) return "memory";
  if (env.DATABASE_URL) return "postgres";

  throw new Error(
    "Persistent storage is required. Set DATABASE_URL (recommended) or explicitly set SEALED_REVIEW_STATE_BACKEND=memory for ephemeral local development."
  );
}

export function decryptionTimeoutMs(): number {
  return readEnv().DECRYPTION_TIMEOUT_MS ?? DECRYPTION_TIMEOUT_MS_DEFAULT;
}

export function minReviewFee(): bigint {
  const configured = readEnv().MIN_REVIEW_FEE;
  return configured ? BigInt(configured) : MIN_REVIEW_FEE_DEFAULT;
}

export function signatureMaxSkewMs(): number {
  return readEnv().SIGNATURE_MAX_SKEW_MS ?? SIGNATURE_MAX_SKEW_MS_DEFAULT;
}

export function shouldAllowUnsignedDev(): boolean {
  return (readEnv().ALLOW_UNSIGNED_DEV || "false").toLowerCase() === "true";
}

export function internalJobToken(): string | null {
  return readEnv().INTERNAL_JOB_TOKEN || null;
}

export interface RuntimeSecrets {
  ownerAddress: string;
  encryptorKey: Buffer;
  gatewaySeed: Buffer;
}

/**
 * Genesis owner and collaborator key material. Tests get fixed placeholder
 * values so the in-memory runtime boots without configuration.
 */
export function getRuntimeSecrets(): RuntimeSecrets {
  const env = readEnv();
  const isTest = env.NODE_ENV === "test";
  const ownerAddress = env.SEALED_REVIEW_OWNER_ADDRESS || (isTest ? "0x0000000000000000000000000000000000000001" : "");
  const encryptorKey = env.ENCRYPTOR_KEY || (isTest ? "11".repeat(32) : "");
  const gatewaySeed = env.GATEWAY_SIGNING_SEED || (isTest ? "22".repeat(32) : "");
  if (!ownerAddress || !encryptorKey || !gatewaySeed) {
    throw new Error("SEALED_REVIEW_OWNER_ADDRESS, ENCRYPTOR_KEY and GATEWAY_SIGNING_SEED must be configured");
  }
  return {
    ownerAddress: ownerAddress.toLowerCase(),
    encryptorKey: Buffer.from(encryptorKey, "hex"),
    gatewaySeed: Buffer.from(gatewaySeed, "hex")
  };
}
