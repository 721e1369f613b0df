/**
 * Edit Applicator
 *
 * Turns an isolated span into either tracked changes (<w:del>/<w:ins> attributed to an
 * author) or a direct replacement. Only the matched runs, plus the run inserted for the
 * replacement, are touched.
 */

import { diffWordsWithSpace } from 'diff';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import { append, appendChild, prepend, removeElement } from 'domutils';
import { childElement, createElement, createText, createTextRun, isTextBearing } from './document-model';
import type { DocumentModel, ParagraphBlock, Run } from './document-model';
import { flatten } from './document-flattener';
import { insertionPoint, isolate } from './run-splitter';
import { buildSearchView, findAll } from './span-resolver';
import { normalize } from './text-normalizer';
import type {
  EditOutcome,
  MatchSpan,
  NormalizedFinding,
  RedlineMode,
  RedlinePolicy,
} from '../../types/redline.types';

export interface EditContext {
  model: DocumentModel;
  paragraph: ParagraphBlock;
  span: MatchSpan;
  /** Revision timestamp, see formatRevisionDate */
  date: string;
  /** Receives every run this edit writes replacement text into */
  written?: Set<Element>;
}

interface RevisionAttributes {
  author: string;
  date: string;
}

/** One contiguous change relative to the matched text */
export interface EditHunk {
  oldStart: number;
  oldEnd: number;
  inserted: string;
}

const RIGHT_PUNCTUATION = new Set([',', '.', ';', ':', '!', '?', ')', ']', '}', '%']);

/**
 * ISO-8601 in UTC with second precision, as Word writes w:date
 */
export function formatRevisionDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * True when the replacement is already in place: the matched text equals it, or an
 * occurrence of it in the paragraph already covers the span.
 */
export function isAlreadyApplied(flatText: string, span: MatchSpan, replacement: string): boolean {
  if (!replacement) return false;
  if (normalize(flatText.slice(span.start, span.end)) === replacement) return true;

  const view = buildSearchView(flatText);
  return findAll(view.text, replacement).some((at) => {
    const start = view.offsets[at];
    const end = view.offsets[at + replacement.length - 1] + 1;
    return start <= span.start && end >= span.end;
  });
}

/**
 * A pure deletion swallows the space before it when that would otherwise leave a
 * double space, a space before punctuation, or a trailing space.
 */
export function widenForDeletion(flatText: string, span: MatchSpan): MatchSpan {
  if (span.start === 0 || flatText[span.start - 1] !== ' ') return span;
  const next = flatText[span.end];
  if (next === undefined || next === ' ' || RIGHT_PUNCTUATION.has(next)) {
    return { ...span, start: span.start - 1 };
  }
  return span;
}

/**
 * Word-level hunks between the matched text and the replacement. Changes separated only
 * by whitespace are merged so the markup reads as one edit.
 */
export function diffHunks(matched: string, replacement: string): EditHunk[] {
  type Segment = { equal: boolean; old: string; added: string };
  const segments: Segment[] = [];

  for (const change of diffWordsWithSpace(matched, replacement)) {
    const last = segments[segments.length - 1];
    if (!change.added && !change.removed) {
      segments.push({ equal: true, old: change.value, added: change.value });
    } else if (last && !last.equal) {
      if (change.added) last.added += change.value;
      else last.old += change.value;
    } else {
      segments.push({
        equal: false,
        old: change.removed ? change.value : '',
        added: change.added ? change.value : '',
      });
    }
  }

  // fold whitespace-only equal segments sitting between two changes
  const merged: Segment[] = [];
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const previous = merged[merged.length - 1];
    const next = segments[i + 1];
    if (segment.equal && previous && !previous.equal && next && !next.equal && !segment.old.trim()) {
      previous.old += segment.old + next.old;
      previous.added += segment.added + next.added;
      i++;
    } else if (!segment.equal && previous && !previous.equal) {
      previous.old += segment.old;
      previous.added += segment.added;
    } else {
      merged.push({ ...segment });
    }
  }

  const hunks: EditHunk[] = [];
  let cursor = 0;
  for (const segment of merged) {
    if (!segment.equal) {
      hunks.push({ oldStart: cursor, oldEnd: cursor + segment.old.length, inserted: segment.added });
    }
    cursor += segment.old.length;
  }
  return hunks;
}

function revisionMark(model: DocumentModel, name: 'w:del' | 'w:ins', attrs: RevisionAttributes): Element {
  return createElement(name, {
    'w:id': model.revisions.allocate(),
    'w:author': attrs.author,
    'w:date': attrs.date,
  });
}

function markRunDeleted(run: Element): void {
  for (const child of run.children) {
    if (!isTag(child)) continue;
    if (child.name === 'w:t') {
      child.name = 'w:delText';
      child.attribs['xml:space'] = 'preserve';
    } else if (child.name === 'w:instrText') {
      child.name = 'w:delInstrText';
    }
  }
}

/**
 * Wrap runs in <w:del>; runs that are direct siblings share one marker.
 * Returns the markers in reading order.
 */
function wrapDeleted(model: DocumentModel, runs: Run[], attrs: RevisionAttributes): Element[] {
  const groups: Element[][] = [];
  for (const { element } of runs) {
    const group = groups[groups.length - 1];
    if (group && group[group.length - 1].next === element) {
      group.push(element);
    } else {
      groups.push([element]);
    }
  }

  return groups.map((group) => {
    const marker = revisionMark(model, 'w:del', attrs);
    prepend(group[0], marker);
    for (const element of group) {
      markRunDeleted(element);
      appendChild(marker, element);
    }
    return marker;
  });
}

function insertionMark(
  ctx: EditContext,
  text: string,
  formattingFrom: Run | undefined,
  attrs: RevisionAttributes
): Element {
  const marker = revisionMark(ctx.model, 'w:ins', attrs);
  const formatting = formattingFrom ? childElement(formattingFrom.element, 'w:rPr') : undefined;
  const run = createTextRun(text, formatting);
  appendChild(marker, run);
  ctx.written?.add(run);
  return marker;
}

/**
 * Mark [start, end) of the paragraph as deleted and put `inserted` right after it
 */
function applyTrackedHunk(
  ctx: EditContext,
  start: number,
  end: number,
  inserted: string,
  attrs: RevisionAttributes
): boolean {
  const { model, paragraph } = ctx;

  if (end > start) {
    const { runs } = isolate(paragraph, { start, end });
    if (runs.length === 0) return false;
    const markers = wrapDeleted(model, runs, attrs);
    if (inserted) {
      append(markers[markers.length - 1], insertionMark(ctx, inserted, runs[0], attrs));
    }
    return true;
  }

  if (!inserted) return false;
  const point = insertionPoint(paragraph, start);
  if (point.after) {
    append(point.after.element, insertionMark(ctx, inserted, point.after, attrs));
  } else if (point.before) {
    prepend(point.before.element, insertionMark(ctx, inserted, point.before, attrs));
  } else {
    return false;
  }
  return true;
}

type ApplyResult = 'applied' | 'unchanged' | 'failed';

function applyTracked(
  ctx: EditContext,
  flatText: string,
  replacementText: string,
  policy: RedlinePolicy
): ApplyResult {
  const attrs: RevisionAttributes = { author: policy.author, date: ctx.date };
  const { start, end } = ctx.span;

  if (policy.trackedGranularity === 'span' || !replacementText) {
    return applyTrackedHunk(ctx, start, end, replacementText, attrs) ? 'applied' : 'failed';
  }

  const hunks = diffHunks(flatText.slice(start, end), replacementText);
  if (hunks.length === 0) return 'unchanged';

  let applied = 0;
  // right to left keeps the offsets of earlier hunks valid
  for (const hunk of [...hunks].reverse()) {
    if (applyTrackedHunk(ctx, start + hunk.oldStart, start + hunk.oldEnd, hunk.inserted, attrs)) {
      applied++;
    }
  }
  return applied > 0 ? 'applied' : 'failed';
}

function hasContent(run: Element): boolean {
  return run.children.some((child) => isTag(child) && child.name !== 'w:rPr');
}

/**
 * Overwrite the runs' text with `text`: it goes into the first run (keeping that run's
 * formatting), the others lose their text and disappear when nothing else is left in them.
 */
function applyClean(runs: Run[], text: string, written?: Set<Element>): ApplyResult {
  if (runs.length === 0) return 'failed';
  const first = runs[0].element;

  const replacement = text ? createText(text) : undefined;
  const anchor = first.children.find(isTextBearing);
  if (replacement && anchor) {
    prepend(anchor, replacement);
    written?.add(first);
  }

  for (const { element } of runs) {
    for (const child of [...element.children]) {
      if (child !== replacement && isTextBearing(child)) removeElement(child);
    }
    if ((element !== first || !replacement) && !hasContent(element)) {
      removeElement(element);
    }
  }
  return 'applied';
}

/**
 * Apply one finding at a resolved span
 */
export function applyEdit(
  ctx: EditContext,
  finding: NormalizedFinding,
  mode: RedlineMode,
  policy: RedlinePolicy
): EditOutcome {
  const findingId = finding.finding.id;
  const { text: flatText } = flatten(ctx.paragraph);

  if (policy.skipIfSame && isAlreadyApplied(flatText, ctx.span, finding.replacement)) {
    return { findingId, status: 'skipped-unchanged', span: ctx.span };
  }

  const span = finding.replacementText ? ctx.span : widenForDeletion(flatText, ctx.span);
  const spanCtx: EditContext = { ...ctx, span };

  const result =
    mode === 'tracked'
      ? applyTracked(spanCtx, flatText, finding.replacementText, policy)
      : applyClean(isolate(ctx.paragraph, span).runs, finding.replacementText, ctx.written);

  switch (result) {
    case 'applied':
      return { findingId, status: 'applied', span };
    case 'unchanged':
      return { findingId, status: 'skipped-unchanged', span };
    case 'failed':
      return { findingId, status: 'skipped-not-found', span };
  }
}
