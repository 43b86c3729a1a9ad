/**
 * Name Suggestion
 * Substring-overlap matching for failed name lookups
 */

/**
 * Find candidates that overlap the target by substring.
 *
 * Constraints:
 * - Match when either text contains the other
 * - Candidates compare by their String() form
 * - Empty target or empty candidate never matches
 * - Case-sensitive; candidate order is preserved
 *
 * @param target - Name that failed to resolve
 * @param candidates - Available names or keys
 * @returns Matching candidates; empty array when none match
 *
 * @example
 * findSimilar('user', ['username', 'use', 'id'])
 * // ['username', 'use']
 */
export function findSimilar<T>(target: string, candidates: Iterable<T>): T[] {
  if (target === '') {
    return [];
  }

  const matches: T[] = [];
  for (const candidate of candidates) {
    const text = String(candidate);
    if (text === '') continue;
    if (text.includes(target) || target.includes(text)) {
      matches.push(candidate);
    }
  }
  return matches;
}
