/**
 * Convert a 1-based bind position into an array offset.
 */
export function bindIndex(index: number): number {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Bind index must be a positive integer, received ${index}`);
  }
  return index - 1;
}
