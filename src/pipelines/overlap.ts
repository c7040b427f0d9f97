export const DEFAULT_MIN_OVERLAP_LENGTH = 50;

/**
 * Finds the longest suffix of `previous` that is also a prefix of `next`.
 *
 * Only overlaps of at least `minLength` characters count; shorter shared
 * fragments ("the data", "Article 6") are common enough in guideline prose
 * to produce false positives. Returns an empty string when nothing matches.
 */
export function findOverlap(
  previous: string,
  next: string,
  minLength: number = DEFAULT_MIN_OVERLAP_LENGTH,
): string {
  const floor = Math.max(1, Math.floor(minLength));
  if (previous.length < floor || next.length < floor) {
    return "";
  }

  for (let length = Math.min(previous.length, next.length); length >= floor; length -= 1) {
    if (previous.endsWith(next.slice(0, length))) {
      return next.slice(0, length);
    }
  }
  return "";
}
