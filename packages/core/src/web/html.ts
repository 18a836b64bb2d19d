/**
 * @module web/html
 * Plain-text cleanup for snippets that arrive with markup.
 */

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  '#39': "'",
};

const MAX_CODE_POINT = 0x10ffff;

export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/&(#?\w+);/g, (whole, name: string) => ENTITIES[name] ?? decodeNumeric(name) ?? whole)
    .replace(/\s+/g, ' ')
    .trim();
}

function decodeNumeric(name: string): string | undefined {
  const match = /^#(x?)([0-9a-f]+)$/i.exec(name);
  if (!match) return undefined;
  const code = parseInt(match[2] ?? '', match[1] ? 16 : 10);
  return Number.isNaN(code) || code > MAX_CODE_POINT ? undefined : String.fromCodePoint(code);
}
