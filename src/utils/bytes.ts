export const equalBytes = (a: Uint8Array, b: Uint8Array): boolean => {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
};

/** Splits bytes into 4-bit nibbles, high nibble first. */
export const toNibbles = (bytes: Uint8Array): number[] => {
  const out: number[] = [];
  for (const b of bytes) out.push(b >> 4, b & 0x0f);
  return out;
};

export const bytesToBigInt = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt("0x" + Buffer.from(b).toString("hex"));
