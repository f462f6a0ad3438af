// Cleartext payloads are 0x-prefixed hex: one 32-byte big-endian word per value.

const WORD_HEX_LENGTH = 64;

export function encodeCleartexts(values: number[]): string {
  return `0x${values
    .map((value) => {
      if (!Number.isInteger(value) || value < 0) {
        throw new Error("Cleartext values must be non-negative integers");
      }
      return value.toString(16).padStart(WORD_HEX_LENGTH, "0");
    })
    .join("")}`;
}

export function decodeCleartexts(payload: string): number[] | null {
  const body = payload.startsWith("0x") ? payload.slice(2) : payload;
  if (body.length === 0 || body.length % WORD_HEX_LENGTH !== 0 || !/^[0-9a-fA-F]+$/.test(body)) {
    return null;
  }
  const values: number[] = [];
  for (let offset = 0; offset < body.length; offset += WORD_HEX_LENGTH) {
    const word = BigInt(`0x${body.slice(offset, offset + WORD_HEX_LENGTH)}`);
    if (word > BigInt(Number.MAX_SAFE_INTEGER)) return null;
    values.push(Number(word));
  }
  return values;
}

export function decodeScoreAndRisk(payload: string): { score: number; riskLevel: number } | null {
  const values = decodeCleartexts(payload);
  if (!values || values.length !== 2) return null;
  const [score, riskLevel] = values;
  return { score, riskLevel };
}
