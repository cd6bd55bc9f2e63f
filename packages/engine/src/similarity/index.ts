/**
 * Text overlap metrics used by candidate selection.
 *
 * All functions are pure and total: every pair of strings, including empty
 * ones, has a defined similarity in [0, 1].
 *
 * Cost: Levenshtein is O(n·m) per pair. An all-pairs comparison over N
 * candidates is therefore O(N²·n·m). Fine for tens of candidates, not for
 * thousands.
 */

const TOKEN_SEPARATOR = /[\s\p{P}]+/u;

const graphemeSegmenter = new Intl.Segmenter(undefined, {
  granularity: "grapheme",
});

/** Splits text into user-perceived characters. */
export function graphemes(text: string): string[] {
  return Array.from(graphemeSegmenter.segment(text), (part) => part.segment);
}

function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(TOKEN_SEPARATOR)
      .filter((token) => token.length > 0)
  );
}

/**
 * Jaccard index over lower-cased word sets: |A ∩ B| / |A ∪ B|.
 *
 * Two texts with no tokens count as identical (1.0); exactly one empty
 * side scores 0.0.
 */
export function jaccardSimilarity(text1: string, text2: string): number {
  const tokens1 = tokenize(text1);
  const tokens2 = tokenize(text2);

  if (tokens1.size === 0 && tokens2.size === 0) return 1.0;
  if (tokens1.size === 0 || tokens2.size === 0) return 0.0;

  let intersection = 0;
  for (const token of tokens1) {
    if (tokens2.has(token)) intersection++;
  }
  const union = tokens1.size + tokens2.size - intersection;

  return intersection / union;
}

/**
 * Classic edit distance over graphemes (insert, delete and substitute
 * each cost 1).
 */
export function levenshteinDistance(text1: string, text2: string): number {
  const chars1 = graphemes(text1);
  const chars2 = graphemes(text2);

  if (chars1.length === 0) return chars2.length;
  if (chars2.length === 0) return chars1.length;

  // Two rows of the (len1 + 1) × (len2 + 1) table are enough
  let previous = Array.from({ length: chars2.length + 1 }, (_, j) => j);
  let current = new Array<number>(chars2.length + 1).fill(0);

  for (let i = 1; i <= chars1.length; i++) {
    current[0] = i;
    for (let j = 1; j <= chars2.length; j++) {
      const cost = chars1[i - 1] === chars2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[chars2.length];
}

/**
 * 1 − distance / max(len1, len2). Both empty → 1.0, one empty → 0.0.
 */
export function editDistanceSimilarity(text1: string, text2: string): number {
  const len1 = graphemes(text1).length;
  const len2 = graphemes(text2).length;

  if (len1 === 0 && len2 === 0) return 1.0;
  if (len1 === 0 || len2 === 0) return 0.0;

  return 1.0 - levenshteinDistance(text1, text2) / Math.max(len1, len2);
}

/**
 * Weighted average of the Jaccard and edit-distance similarities.
 * Returns 0.0 when the weights sum to zero or less.
 */
export function combinedSimilarity(
  text1: string,
  text2: string,
  jaccardWeight: number,
  editWeight: number
): number {
  const totalWeight = jaccardWeight + editWeight;
  if (!(totalWeight > 0)) return 0.0;

  const jaccard = jaccardSimilarity(text1, text2);
  const edit = editDistanceSimilarity(text1, text2);

  return (jaccard * jaccardWeight + edit * editWeight) / totalWeight;
}
