/**
 * Name normalization
 * Comparison key for stop names: case, accent, hyphen and space insensitive.
 */

// Letters that NFD leaves alone; folded so "skoyen" finds "Skøyen"
const FOLDS: Record<string, string> = {
  ø: 'o',
  æ: 'ae',
  œ: 'oe',
  ß: 'ss',
  ł: 'l',
  đ: 'd',
};

const COMBINING_MARK = /\p{Mn}/gu;
const FOLDABLE = /[øæœßłđ]/g;
const SEPARATORS = /[- ]/g;

export function normalize(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .normalize('NFD')
    .replace(COMBINING_MARK, '')
    .replace(FOLDABLE, (ch) => FOLDS[ch] ?? ch)
    .replace(SEPARATORS, '');
}

/**
 * Whether a token addresses the cache by position.
 * Only plain ASCII digit runs count; "-1" and "1.5" are names.
 */
export function isIndexToken(token: string): boolean {
  return /^\d+$/.test(token);
}
