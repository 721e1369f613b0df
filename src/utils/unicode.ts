/**
 * Unicode utility functions for text normalization
 */

/**
 * Typographic characters folded to their ASCII equivalents before matching.
 * Characters mapped to '' are dropped.
 */
const TYPOGRAPHY_FOLD_MAP: Record<string, string> = {
  '\u2018': "'", // ‘
  '\u2019': "'", // ’
  '\u201A': "'", // ‚
  '\u201B': "'", // ‛
  '\u2032': "'", // ′
  '\u201C': '"', // “
  '\u201D': '"', // ”
  '\u201E': '"', // „
  '\u201F': '"', // ‟
  '\u2033': '"', // ″
  '\u00AB': '"', // «
  '\u00BB': '"', // »
  '\u2010': '-', // hyphen
  '\u2011': '-', // non-breaking hyphen
  '\u2012': '-', // figure dash
  '\u2013': '-', // –
  '\u2014': '-', // —
  '\u2015': '-', // horizontal bar
  '\u2212': '-', // minus sign
  '\u2026': '...', // …
  '\u00A0': ' ', // no-break space
  '\u2007': ' ', // figure space
  '\u2009': ' ', // thin space
  '\u200A': ' ', // hair space
  '\u202F': ' ', // narrow no-break space
  '\u3000': ' ', // ideographic space
  '\u00AD': '', // soft hyphen
  '\u200B': '', // zero-width space
  '\u200C': '',
  '\u200D': '',
  '\u2060': '', // word joiner
  '\uFEFF': '', // BOM
};

/**
 * Fold a single character. Whitespace of any kind becomes a plain space.
 *
 * @example foldChar('’') === "'"
 */
export function foldChar(ch: string): string {
  const mapped = TYPOGRAPHY_FOLD_MAP[ch];
  if (mapped !== undefined) return mapped;
  return /\s/.test(ch) ? ' ' : ch;
}

/**
 * Fold every character of a string (see foldChar)
 */
export function foldTypography(text: string): string {
  let out = '';
  for (const ch of text) {
    out += foldChar(ch);
  }
  return out;
}

/**
 * Lower-case one character, keeping it unchanged when lower-casing would change its length
 * (e.g. 'İ'), so offsets stay aligned.
 */
export function lowerChar(ch: string): string {
  const lower = ch.toLowerCase();
  return lower.length === ch.length ? lower : ch;
}

export function lowerPreservingLength(text: string): string {
  let out = '';
  for (const ch of text) {
    out += lowerChar(ch);
  }
  return out;
}
