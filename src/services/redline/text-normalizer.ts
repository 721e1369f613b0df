import { foldTypography } from '../../utils/unicode';
import type { Finding, NormalizedFinding } from '../../types/redline.types';

/** Citation text the reviewer emits when it could not quote the document */
export const NOT_FOUND_CITATION = 'Not Found';

// control characters XML 1.0 cannot carry
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;
const HTML_TAG = /<\/?[a-zA-Z][^<>]*>/g;
// Marker pairs must wrap text; runs of three or more underscores are fill-in blanks
const PAIRED_EMPHASIS = /(?<![*_])(\*\*|__)(?![\s*_])([\s\S]*?[^\s*_])\1(?![*_])/g;
const BACKTICKS = /`+/g;
const LEADING_EMPHASIS = /(^|\s)[*_]{1,2}(?=[^\s*_])/g;
const TRAILING_EMPHASIS = /(?<=[^\s*_])[*_]{1,2}(?=\s|$|[.,;:!?)])/g;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Remove emphasis markers and inline tags that leak into reviewer output,
 * e.g. "**shall** pay" or "<b>shall</b> pay".
 */
export function stripMarkup(text: string): string {
  return text
    .replace(HTML_TAG, '')
    .replace(PAIRED_EMPHASIS, '$2')
    .replace(BACKTICKS, '')
    .replace(LEADING_EMPHASIS, '$1')
    .replace(TRAILING_EMPHASIS, '');
}

/**
 * Canonical form used for every comparison: markup stripped, quotes/dashes/spaces
 * folded to ASCII, whitespace collapsed, trimmed. Never throws.
 */
export function normalize(text: string | null | undefined): string {
  if (!text) return '';
  return collapseWhitespace(foldTypography(stripMarkup(text.replace(CONTROL_CHARS, ''))));
}

export function isNotFoundCitation(citation: string): boolean {
  return citation.trim().toLowerCase() === NOT_FOUND_CITATION.toLowerCase();
}

export function normalizeFinding(finding: Finding): NormalizedFinding {
  const replacementText = collapseWhitespace(stripMarkup(finding.suggestedReplacement));
  return {
    finding,
    citation: isNotFoundCitation(finding.citation) ? '' : normalize(finding.citation),
    replacement: normalize(replacementText),
    replacementText,
  };
}
