/**
 * Efficiency gate: a candidate is only worth publishing if it saves space.
 * A tie is rejected.
 */
export function isEfficient(originalSizeBytes: number, candidateSizeBytes: number): boolean {
  return candidateSizeBytes < originalSizeBytes;
}
