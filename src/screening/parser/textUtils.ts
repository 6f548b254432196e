/**
 * Text Utilities
 *
 * Word splitting and case-insensitive matching shared by the chunker, the
 * retriever and the skill lookups.
 */

/**
 * Whitespace-delimited tokens
 */
export function splitWords(text: string): string[] {
  if (!text) {
    return [];
  }
  return text.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Key for case-insensitive identity: trimmed and lowercased
 */
export function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Count non-overlapping, case-insensitive occurrences of needle in haystack.
 * An empty needle never occurs.
 */
export function countOccurrences(haystack: string, needle: string): number {
  const target = normalizeKey(needle);
  if (!target) {
    return 0;
  }

  const source = haystack.toLowerCase();
  let count = 0;
  let from = source.indexOf(target);
  while (from !== -1) {
    count++;
    from = source.indexOf(target, from + target.length);
  }
  return count;
}

/**
 * Case-insensitive substring test
 */
export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return countOccurrences(haystack, needle) > 0;
}

/**
 * De-duplicate strings case-insensitively, keeping the first spelling seen
 */
export function uniqueIgnoreCase(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = normalizeKey(value);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(value.trim());
  }
  return result;
}
