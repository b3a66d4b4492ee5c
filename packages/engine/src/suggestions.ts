/**
 * "Did you mean" suggestions for unknown variable and tag names
 */

const MAX_SUGGESTIONS = 3;

/**
 * Candidates within edit distance max(len/2, 2) of the target, closest
 * first. Comparison ignores case; ties keep candidate order.
 */
export function findSimilar(
  target: string,
  candidates: readonly string[],
  limit: number = MAX_SUGGESTIONS,
): string[] {
  const maxDistance = Math.max(Math.floor(target.length / 2), 2);
  const needle = target.toLowerCase();

  return candidates
    .map((candidate) => ({ candidate, distance: levenshteinDistance(needle, candidate.toLowerCase()) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, limit)
    .map(({ candidate }) => candidate);
}

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const m = str1.length;
  const n = str2.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      if (str1[i - 1] === str2[j - 1]) {
        dp[i][j] = dp[i - 1][j - 1];
      } else {
        dp[i][j] =
          1 +
          Math.min(
            dp[i - 1][j], // deletion
            dp[i][j - 1], // insertion
            dp[i - 1][j - 1], // substitution
          );
      }
    }
  }

  return dp[m][n];
}
