/**
 * @module language
 * Guess whether free text is English or Nepali.
 *
 * Order of checks:
 * 1. More than 30% of characters in the Devanagari block → `np`.
 * 2. Any common Nepali help-desk phrase present → `np`.
 * 3. Between 10% and 30% Devanagari in a text of more than three words → `np`.
 * 4. Otherwise `en`; blank text is `en`.
 */

import type { Lang } from './types.js';

const DEVANAGARI_START = 0x0900;
const DEVANAGARI_END = 0x097f;

export const NEPALI_KEYPHRASES: readonly string[] = [
  'इन्टरनेट',
  'चल्दैन',
  'कम्प्युटर',
  'फोन',
  'समस्या',
  'छ',
  'भएको',
  'मर्मत',
  'कृपया',
  'सहयोग',
  'गर्नुहोस्',
  'हुन्छ',
];

/** Share of characters (0–1) in the Devanagari block. */
export function devanagariRatio(text: string): number {
  const chars = Array.from(text);
  if (chars.length === 0) return 0;
  let count = 0;
  for (const ch of chars) {
    const code = ch.codePointAt(0) ?? 0;
    if (code >= DEVANAGARI_START && code <= DEVANAGARI_END) count++;
  }
  return count / chars.length;
}

export function detectLanguage(text: string): Lang {
  if (!text.trim()) return 'en';

  const ratio = devanagariRatio(text);
  if (ratio > 0.3) return 'np';

  const lowered = text.toLowerCase();
  if (NEPALI_KEYPHRASES.some((phrase) => lowered.includes(phrase))) return 'np';

  const words = text.split(/\s+/).filter(Boolean).length;
  if (ratio > 0.1 && ratio <= 0.3 && words > 3) return 'np';

  return 'en';
}
