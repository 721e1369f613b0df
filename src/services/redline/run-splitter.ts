/**
 * Run Splitter
 *
 * Splits formatting runs at span boundaries so the matched text sits in whole runs of its
 * own. Only run granularity changes: the paragraph text is the same before and after.
 */

import { isTag } from 'domhandler';
import type { ChildNode, Element } from 'domhandler';
import { append, appendChild } from 'domutils';
import {
  childElement,
  cloneFormatting,
  createElement,
  runChildText,
  setText,
  textOf,
} from './document-model';
import type { ParagraphBlock, Run } from './document-model';
import { flatten, locate } from './document-flattener';
import type { FlatIndex } from './document-flattener';

export interface IsolatedSpan {
  /** Runs lying entirely inside the span, in reading order */
  runs: Run[];
  index: FlatIndex;
}

export interface InsertionPoint {
  /** Run ending at the offset; insert after it */
  after?: Run;
  /** Run starting at the offset; insert before it */
  before?: Run;
}

/**
 * Split one <w:r> so that its first `offset` characters stay in it and the rest move to a
 * new run placed right after it, carrying a copy of the same <w:rPr>.
 * Returns the new right-hand run.
 */
export function splitRunAt(run: Element, offset: number): Element {
  const right = createElement(run.name, run.attribs);
  const formatting = childElement(run, 'w:rPr');
  if (formatting) appendChild(right, cloneFormatting(formatting));

  const moving: ChildNode[] = [];
  let cursor = 0;
  for (const child of run.children) {
    if (isTag(child) && child.name === 'w:rPr') continue;
    const length = runChildText(child).length;

    if (cursor >= offset) {
      moving.push(child);
    } else if (cursor + length > offset && isTag(child) && child.name === 'w:t') {
      const text = textOf(child);
      const tail = createElement('w:t', child.attribs);
      setText(tail, text.slice(offset - cursor));
      setText(child, text.slice(0, offset - cursor));
      moving.push(tail);
    }
    cursor += length;
  }

  for (const node of moving) {
    appendChild(right, node);
  }
  append(run, right);
  return right;
}

/**
 * Make `offset` a run boundary. No-op when it already is one or lies past the text.
 */
function splitAt(paragraph: ParagraphBlock, offset: number): void {
  const { index } = flatten(paragraph);
  const position = locate(index, offset);
  if (!position || position.runOffset === 0) return;
  splitRunAt(index.segments[position.runIndex].run.element, position.runOffset);
}

export function isolate(paragraph: ParagraphBlock, span: { start: number; end: number }): IsolatedSpan {
  splitAt(paragraph, span.start);
  splitAt(paragraph, span.end);

  const { index } = flatten(paragraph);
  const runs = index.segments
    .filter((segment) => segment.end > segment.start && segment.start >= span.start && segment.end <= span.end)
    .map((segment) => segment.run);

  return { runs, index };
}

/**
 * Make `offset` a run boundary and report the runs on either side of it
 */
export function insertionPoint(paragraph: ParagraphBlock, offset: number): InsertionPoint {
  splitAt(paragraph, offset);
  const { index } = flatten(paragraph);
  const visible = index.segments.filter((segment) => segment.end > segment.start);
  return {
    after: visible.find((segment) => segment.end === offset)?.run,
    before: visible.find((segment) => segment.start === offset)?.run,
  };
}
