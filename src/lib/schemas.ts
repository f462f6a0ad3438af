import { z } from "zod";
import { EVENT_TYPES } from "@/lib/constants";

const addressSchema = z
  .string()
  .trim()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x-prefixed 20-byte hex address")
  .transform((value) => value.toLowerCase());

export const submitDocumentRequestSchema = z.object({
  document_hash: z.string().min(1).max(256),
  public_title: z.string().min(1).max(300),
  fee: z.string().regex(/^\d+$/, "fee must be a non-negative integer in base units")
});

// Range checks live in the store so the ledger reports OUT_OF_RANGE, not a schema error.
export const addClauseRequestSchema = z.object({
  clause_type: z.string().min(1).max(120),
  compliance: z.number(),
  sensitivity: z.number(),
  notes: z.string().max(4000).default("")
});

export const completeAnalysisRequestSchema = z.object({
  data_sensitivity: z.number(),
  gdpr_compliance: z.number(),
  ccpa_compliance: z.number(),
  retention_risk: z.number(),
  sharing_risk: z.number()
});

export const reviewerRequestSchema = z.object({
  address: addressSchema
});

export const withdrawRequestSchema = z.object({
  to: addressSchema
});

export const decryptionCallbackRequestSchema = z.object({
  request_id: z.string().min(1),
  cleartexts: z.string().regex(/^0x([0-9a-fA-F]{64})*$/, "cleartexts must be 0x-prefixed 32-byte words"),
  proof: z.string().min(1)
});

export const listEventsQuerySchema = z.object({
  document_id: z.coerce.number().int().positive().optional(),
  type: z.nativeEnum(EVENT_TYPES).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional()
});

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().min(0).optional()
});

