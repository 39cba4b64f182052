// src/utils/text.ts

/** Lowercase, split camelCase, turn every non-alphanumeric run into one space */
export function normalize(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function tokenize(value: string): string[] {
  const normalized = normalize(value);
  return normalized === '' ? [] : normalized.split(' ');
}

/** `lead_email`, `leadEmail` and `Lead Email` all become `lead_email` */
export function nameKey(value: string): string {
  return tokenize(value).join('_');
}

export function singularize(word: string): string {
  if (word.length > 3 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

export function jaccard(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size === 0 && right.size === 0) return 0;
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared += 1;
  }
  return shared / (left.size + right.size - shared);
}

/** True when every token of `needle` appears in `haystack` */
export function containsAllTokens(haystack: readonly string[], needle: readonly string[]): boolean {
  if (needle.length === 0) return false;
  const set = new Set(haystack);
  return needle.every((token) => set.has(token));
}
