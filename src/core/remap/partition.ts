/**
 * Splits `identifiers` into consecutive slices of `chunkSize`; only the last slice may be shorter.
 * Empty input yields no chunks.
 */
export const partitionIdentifiers = (identifiers: readonly string[], chunkSize: number): string[][] => {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error(`chunkSize must be an integer >= 1. Received: ${String(chunkSize)}`);
  }

  const chunks: string[][] = [];
  for (let start = 0; start < identifiers.length; start += chunkSize) {
    chunks.push(identifiers.slice(start, start + chunkSize));
  }
  return chunks;
};
