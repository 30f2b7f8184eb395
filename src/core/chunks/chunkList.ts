/**
 * Splits `items` into consecutive chunks of at most `size`, preserving order.
 */
export const chunkList = <T>(items: readonly T[], size: number): T[][] => {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error("chunk size must be an integer >= 1");
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};
