/**
 * Span Resolver
 *
 * Locates a normalized citation inside a paragraph's flat text. Matching runs on a search
 * view of the flat text (typography folded, whitespace collapsed) that keeps a map back to
 * flat offsets, so the span handed to the run splitter addresses the document as written.
 *
 * Tiers, in order: exact, case-insensitive (when allowed), fuzzy token overlap.
 * Ties always go to the leftmost candidate.
 */

import { foldChar, lowerPreservingLength } from '../../utils/unicode';
import type { Element } from 'domhandler';
import { searchableText } from './document-flattener';
import type { DocumentModel } from './document-model';
import type { MatchConfidence, MatchSpan } from '../../types/redline.types';

export interface ResolveOptions {
  ignoreCase: boolean;
  fuzzyThreshold: number;
}

export interface SearchView {
  text: string;
  lower: string;
  /** offsets[i] is the flat-text offset the i-th view character came from */
  offsets: number[];
}

export interface ViewMatch {
  start: number;
  end: number;
  score: number;
}

interface Token {
  key: string;
  start: number;
  end: number;
}

export interface DocumentResolution {
  span: MatchSpan;
  /** Exact (or case-insensitive) occurrences across the document; 1 for fuzzy matches */
  occurrences: number;
}

export function buildSearchView(flatText: string): SearchView {
  let text = '';
  const offsets: number[] = [];
  let previousWasSpace = false;

  for (let i = 0; i < flatText.length; i++) {
    for (const ch of foldChar(flatText[i])) {
      const isSpace = ch === ' ';
      if (isSpace && previousWasSpace) continue;
      previousWasSpace = isSpace;
      text += ch;
      offsets.push(i);
    }
  }

  return { text, lower: lowerPreservingLength(text), offsets };
}

/**
 * Non-overlapping occurrences of `needle`, left to right
 */
export function findAll(haystack: string, needle: string): number[] {
  const hits: number[] = [];
  if (!needle) return hits;
  let from = 0;
  while (from <= haystack.length - needle.length) {
    const at = haystack.indexOf(needle, from);
    if (at === -1) break;
    hits.push(at);
    from = at + needle.length;
  }
  return hits;
}

const EDGE_PUNCTUATION = /^([^\p{L}\p{N}]*)([\s\S]*?)([^\p{L}\p{N}]*)$/u;

// whitespace and excluded characters both end a word
const WORD = /[^\s\u0000]+/g;

/**
 * Words with surrounding punctuation stripped. Offsets cover the word only, so a fuzzy
 * span never takes the sentence's closing punctuation with it.
 */
function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(WORD)) {
    const parts = EDGE_PUNCTUATION.exec(match[0]);
    if (!parts || !parts[2]) continue;
    const start = (match.index ?? 0) + parts[1].length;
    tokens.push({ key: lowerPreservingLength(parts[2]), start, end: start + parts[2].length });
  }
  return tokens;
}

function countKeys(tokens: Token[], from = 0, to = tokens.length): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = from; i < to; i++) {
    counts.set(tokens[i].key, (counts.get(tokens[i].key) ?? 0) + 1);
  }
  return counts;
}

function intersectionSize(a: Map<string, number>, b: Map<string, number>): number {
  let shared = 0;
  for (const [key, count] of a) {
    shared += Math.min(count, b.get(key) ?? 0);
  }
  return shared;
}

/**
 * Best window of paragraph tokens by Dice coefficient over token multisets.
 * Window sizes range over the citation's token count +/- 20% (at least one token). The
 * lower bound drops further to the smallest window that could still reach the threshold,
 * so a paragraph shorter than the citation is scored too.
 */
export function findFuzzy(view: SearchView, citation: string, threshold: number): ViewMatch | null {
  const wanted = tokenize(citation);
  const tokens = tokenize(view.text);
  const n = wanted.length;
  if (n === 0 || tokens.length === 0) return null;

  const wantedCounts = countKeys(wanted);
  // 2I / (n + w) can never beat 2I / (n + I); skip paragraphs that cannot reach the floor
  const reachable = intersectionSize(wantedCounts, countKeys(tokens));
  if ((2 * reachable) / (n + reachable) < threshold) return null;

  const slack = Math.max(1, Math.round(n * 0.2));
  // 2w / (n + w) >= threshold  <=>  w >= threshold * n / (2 - threshold)
  const smallestReaching = Math.ceil((threshold * n) / (2 - threshold) - 1e-9);
  const minSize = Math.max(1, Math.min(n - slack, smallestReaching));
  const maxSize = n + slack;

  let best: ViewMatch | null = null;
  for (let i = 0; i < tokens.length; i++) {
    for (let size = minSize; size <= maxSize && i + size <= tokens.length; size++) {
      const shared = intersectionSize(wantedCounts, countKeys(tokens, i, i + size));
      const score = (2 * shared) / (n + size);
      if (score >= threshold && (!best || score > best.score)) {
        best = { start: tokens[i].start, end: tokens[i + size - 1].end, score };
      }
    }
  }
  return best;
}

function toSpan(
  view: SearchView,
  match: ViewMatch,
  confidence: MatchConfidence,
  paragraphId: number
): MatchSpan {
  return {
    paragraphId,
    start: view.offsets[match.start],
    end: view.offsets[match.end - 1] + 1,
    confidence,
    score: match.score,
  };
}

function firstSubstring(haystack: string, needle: string): { hit: ViewMatch | null; count: number } {
  const hits = findAll(haystack, needle);
  if (hits.length === 0) return { hit: null, count: 0 };
  return { hit: { start: hits[0], end: hits[0] + needle.length, score: 1 }, count: hits.length };
}

/**
 * Resolve a normalized citation within one paragraph's flat text
 */
export function resolve(
  flatText: string,
  citation: string,
  options: ResolveOptions,
  paragraphId = 0
): MatchSpan | null {
  if (!citation) return null;
  const view = buildSearchView(flatText);

  const exact = firstSubstring(view.text, citation).hit;
  if (exact) return toSpan(view, exact, 'exact', paragraphId);

  if (options.ignoreCase) {
    const insensitive = firstSubstring(view.lower, lowerPreservingLength(citation)).hit;
    if (insensitive) return toSpan(view, insensitive, 'case-insensitive', paragraphId);
  }

  const fuzzy = findFuzzy(view, citation, options.fuzzyThreshold);
  return fuzzy ? toSpan(view, fuzzy, 'fuzzy', paragraphId) : null;
}

/**
 * Resolve a citation against every paragraph. A better tier anywhere in the document wins
 * over a weaker tier in an earlier paragraph; within a tier the first paragraph wins.
 * Runs in `exclude` are invisible to the search.
 */
export function resolveInDocument(
  model: DocumentModel,
  citation: string,
  options: ResolveOptions,
  exclude?: ReadonlySet<Element>
): DocumentResolution | null {
  if (!citation) return null;

  const views = model.paragraphs.map((paragraph) => ({
    paragraphId: paragraph.id,
    view: buildSearchView(searchableText(paragraph, exclude)),
  }));

  const substringTier = (
    pick: (view: SearchView) => string,
    needle: string,
    confidence: MatchConfidence
  ): DocumentResolution | null => {
    let span: MatchSpan | null = null;
    let occurrences = 0;
    for (const { paragraphId, view } of views) {
      const { hit, count } = firstSubstring(pick(view), needle);
      occurrences += count;
      if (hit && !span) span = toSpan(view, hit, confidence, paragraphId);
    }
    return span ? { span, occurrences } : null;
  };

  const exact = substringTier((view) => view.text, citation, 'exact');
  if (exact) return exact;

  if (options.ignoreCase) {
    const insensitive = substringTier(
      (view) => view.lower,
      lowerPreservingLength(citation),
      'case-insensitive'
    );
    if (insensitive) return insensitive;
  }

  let best: MatchSpan | null = null;
  for (const { paragraphId, view } of views) {
    const fuzzy = findFuzzy(view, citation, options.fuzzyThreshold);
    if (fuzzy && (!best || fuzzy.score > best.score)) {
      best = toSpan(view, fuzzy, 'fuzzy', paragraphId);
    }
  }
  return best ? { span: best, occurrences: 1 } : null;
}
