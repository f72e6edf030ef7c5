/**
 * Split a list into consecutive batches of at most `size` items.
 *
 * Lazy: each batch is sliced when requested. Call again to start over.
 */
export function* chunk<T>(items: readonly T[], size: number): Generator<T[], void, undefined> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size);
  }
}

/**
 * Number of batches `chunk` yields for a list of `length` items
 */
export function countChunks(length: number, size: number): number {
  return Math.ceil(length / size);
}
