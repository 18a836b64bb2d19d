/**
 * @module matching/similarity
 * Order-independent string similarity on a 0–100 scale.
 *
 * `tokenSetRatio` compares the shared words of two strings against each
 * side's leftover words, so extra words on one side cost little:
 * "my wifi is not working" vs "wifi not working" scores 100.
 */

const WORD = /[\p{L}\p{M}\p{N}_]+/gu;

/** Lowercased word tokens of `text`, in order. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD) ?? [];
}

/**
 * Indel similarity: `2·LCS / (|a| + |b|)` scaled to 0–100 and rounded.
 * Either string empty → 0.
 */
export function ratio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  const lcs = longestCommonSubsequence(Array.from(a), Array.from(b));
  const total = Array.from(a).length + Array.from(b).length;
  return Math.round((200 * lcs) / total);
}

export function tokenSetRatio(a: string, b: string): number {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));
  if (left.size === 0 || right.size === 0) return 0;

  const shared = [...left].filter((t) => right.has(t)).sort();
  const onlyLeft = [...left].filter((t) => !right.has(t)).sort();
  const onlyRight = [...right].filter((t) => !left.has(t)).sort();

  const sect = shared.join(' ');
  const combinedLeft = [sect, ...onlyLeft].join(' ').trim();
  const combinedRight = [sect, ...onlyRight].join(' ').trim();

  return Math.max(
    ratio(sect, combinedLeft),
    ratio(sect, combinedRight),
    ratio(combinedLeft, combinedRight),
  );
}

function longestCommonSubsequence(a: readonly string[], b: readonly string[]): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (const ch of a) {
    const row = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      row[j] = b[j - 1] === ch
        ? (previous[j - 1] ?? 0) + 1
        : Math.max(previous[j] ?? 0, row[j - 1] ?? 0);
    }
    previous = row;
  }
  return previous[b.length] ?? 0;
}
