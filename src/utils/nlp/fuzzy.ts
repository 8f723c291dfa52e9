import { tokenize } from './textNormalizer';

function levenshtein(a: string, b: string): number {
  const an = a.length,
    bn = b.length;
  if (an === 0) return bn;
  if (bn === 0) return an;
  let prev: number[] = Array.from({ length: bn + 1 }, (_, j) => j);
  for (let i = 1; i <= an; i++) {
    const row: number[] = [i];
    for (let j = 1; j <= bn; j++) {
      row[j] = Math.min(
        prev[j] + 1,
        row[j - 1] + 1,
        prev[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1)
      );
    }
    prev = row;
  }
  return prev[bn];
}

/** Edit-distance similarity in [0, 1]; 1 for identical strings. */
export function similarityRatio(a: string, b: string): number {
  if (a === b) return 1;
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - levenshtein(a, b) / maxLen;
}

/** Shared words over the larger of the two word sets. */
export function sharedTokenFraction(a: string, b: string): number {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));
  const size = Math.max(left.size, right.size);
  if (size === 0) return 0;
  let common = 0;
  for (const word of left) if (right.has(word)) common++;
  return common / size;
}
