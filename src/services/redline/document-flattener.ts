import type { Element } from 'domhandler';
import { forEachParagraph, readRuns } from './document-model';
import type { DocumentModel, ParagraphBlock, Run } from './document-model';

export interface RunSegment {
  run: Run;
  /** Offset of the run's first character in the flat text */
  start: number;
  /** Offset just past the run's last character */
  end: number;
}

export interface FlatIndex {
  segments: RunSegment[];
  length: number;
}

export interface FlatParagraph {
  text: string;
  index: FlatIndex;
}

export interface RunPosition {
  runIndex: number;
  runOffset: number;
}

/**
 * Concatenate a paragraph's run texts and record where each run sits in the result.
 * Read-only; call again after any change to the paragraph's runs.
 */
export function flatten(paragraph: ParagraphBlock): FlatParagraph {
  const segments: RunSegment[] = [];
  let text = '';
  for (const run of readRuns(paragraph)) {
    segments.push({ run, start: text.length, end: text.length + run.text.length });
    text += run.text;
  }
  return { text, index: { segments, length: text.length } };
}

/**
 * Run owning the character at `offset`, with the offset inside that run
 */
export function locate(index: FlatIndex, offset: number): RunPosition | null {
  for (let runIndex = 0; runIndex < index.segments.length; runIndex++) {
    const segment = index.segments[runIndex];
    if (offset >= segment.start && offset < segment.end) {
      return { runIndex, runOffset: offset - segment.start };
    }
  }
  return null;
}

/** Stands in for characters a search must not see; never part of a normalized citation */
export const EXCLUDED_CHAR = '\u0000';

/**
 * Flat text with the characters of every run in `exclude` replaced by EXCLUDED_CHAR.
 * Offsets match flatten(paragraph).text.
 */
export function searchableText(paragraph: ParagraphBlock, exclude?: ReadonlySet<Element>): string {
  const { text, index } = flatten(paragraph);
  if (!exclude || exclude.size === 0) return text;

  let masked = '';
  for (const segment of index.segments) {
    masked += exclude.has(segment.run.element)
      ? EXCLUDED_CHAR.repeat(segment.end - segment.start)
      : text.slice(segment.start, segment.end);
  }
  return masked;
}

export function paragraphText(paragraph: ParagraphBlock): string {
  return flatten(paragraph).text;
}

/**
 * Visible text of the whole document, one line per paragraph
 */
export function documentText(model: DocumentModel): string {
  const lines: string[] = [];
  forEachParagraph(model.blocks, (paragraph) => lines.push(paragraphText(paragraph)));
  return lines.join('\n');
}
