/**
 * "Did you mean" suggestions for unknown node type and port names
 */

/** Edit distance between two names, computed over a single row */
export function levenshteinDistance(a: string, b: string): number {
  const row = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    let diagonal = row[0];
    row[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j];
      row[j] = Math.min(above + 1, row[j - 1] + 1, diagonal + (a[i - 1] === b[j - 1] ? 0 : 1));
      diagonal = above;
    }
  }

  return row[b.length];
}

/** Short names like "If" or "*" tolerate a single edit */
function suggestionThreshold(name: string): number {
  if (name.length <= 3) return 1;
  return name.length <= 6 ? 2 : 3;
}

/**
 * Known names close enough to `name` to suggest, closest first. Ties keep
 * the order of `known`, which for a registry or node spec is declaration order.
 */
export function findClosestMatches(name: string, known: readonly string[]): string[] {
  const threshold = suggestionThreshold(name);
  return known
    .filter((candidate) => candidate !== name)
    .map((candidate) => ({ candidate, distance: levenshteinDistance(name, candidate) }))
    .filter(({ distance }) => distance <= threshold)
    .sort((a, b) => a.distance - b.distance)
    .map(({ candidate }) => candidate);
}

/** Sentence suffix naming the closest known name, or '' when there is none */
export function didYouMean(name: string, known: readonly string[]): string {
  const [best] = findClosestMatches(name, known);
  return best === undefined ? '' : ` Did you mean "${best}"?`;
}
