/**
 * Suggestions for misspelt names (sanitizers, vector ids, browsers).
 */

const MAX_SUGGESTIONS = 3;

/** Levenshtein distance, case-insensitive. */
export function calculateDistance(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, j) => j);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const substitution = (previous[j - 1] ?? 0) + (left[i - 1] === right[j - 1] ? 0 : 1);
      const deletion = (previous[j] ?? 0) + 1;
      const insertion = (current[j - 1] ?? 0) + 1;
      current.push(Math.min(substitution, deletion, insertion));
    }
    previous = current;
  }
  return previous[right.length] ?? 0;
}

/** Closest options within `maxDistance`, nearest first; ties keep input order. */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option, order) => ({ option, order, distance: calculateDistance(input, option) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance || a.order - b.order)
    .slice(0, MAX_SUGGESTIONS)
    .map(({ option }) => option);
}

export function suggestAlternatives(input: string, validOptions: readonly string[]): string {
  const close = didYouMean(input, validOptions);
  return close.length > 0
    ? `Did you mean: ${close.join(', ')}?`
    : `Available: ${validOptions.join(', ')}`;
}
