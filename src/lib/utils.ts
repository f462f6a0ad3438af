import { createHash, randomBytes } from "node:crypto";

export function nowIso(): string {
  return new Date().toISOString();
}

export function addMs(dateIso: string, ms: number): string {
  return new Date(new Date(dateIso).getTime() + ms).toISOString();
}

export function randomId(prefix: string): string {
  return `${prefix}_${randomBytes(8).toString("hex")}`;
}

export function sha256Hex(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}

export function toAmount(value: string): bigint {
  return BigInt(value);
}

export function formatAmount(value: bigint): string {
  return value.toString(10);
}

export function isIntegerInRange(value: number, range: { min: number; max: number }): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}

export function paginate<T>(items: T[], page: { limit?: number; offset?: number }, maxLimit: number, defaultLimit: number): T[] {
  const limit = Math.min(Math.max(1, page.limit ?? defaultLimit), maxLimit);
  const offset = Math.max(0, page.offset ?? 0);
  return items.slice(offset, offset + limit);
}
