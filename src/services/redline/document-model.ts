/**
 * Document Model
 *
 * Parses word/document.xml into a tree of blocks (paragraphs and tables) over the live
 * XML nodes. Every mutation in the pipeline happens on these nodes, so serializing the
 * model afterwards yields the edited part with all untouched markup kept as it was.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Element, Text, cloneNode, isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { appendChild, removeElement } from 'domutils';
import { AppError } from '../../utils/app-error';

/** A formatting run: its visible text and the <w:r> node carrying its formatting */
export interface Run {
  text: string;
  element: Element;
}

export interface ParagraphBlock {
  kind: 'paragraph';
  /** Position of the paragraph in document order */
  id: number;
  element: Element;
}

export interface TableCell {
  blocks: Block[];
}

export interface TableRow {
  cells: TableCell[];
}

export interface TableBlock {
  kind: 'table';
  element: Element;
  rows: TableRow[];
}

export type Block = ParagraphBlock | TableBlock;

export interface DocumentModel {
  $: CheerioAPI;
  blocks: Block[];
  paragraphs: ParagraphBlock[];
  revisions: RevisionIdAllocator;
}

// Inline wrappers whose runs are part of the visible paragraph text
const VISIBLE_RUN_CONTAINERS = new Set([
  'w:hyperlink',
  'w:ins',
  'w:moveTo',
  'w:smartTag',
  'w:sdt',
  'w:sdtContent',
  'w:customXml',
  'w:fldSimple',
  'w:dir',
  'w:bdo',
]);

// Block-level wrappers that hold paragraphs/tables (or rows/cells) inside them
const BLOCK_WRAPPERS = new Set(['w:sdt', 'w:sdtContent', 'w:customXml']);

/**
 * Visible characters contributed by one child of a <w:r>
 */
export function runChildText(node: AnyNode): string {
  if (!isTag(node)) return '';
  switch (node.name) {
    case 'w:t':
      return textOf(node);
    case 'w:tab':
    case 'w:ptab':
      return '\t';
    case 'w:br':
    case 'w:cr':
      return '\n';
    case 'w:noBreakHyphen':
      return '-';
    default:
      return '';
  }
}

export function isTextBearing(node: AnyNode): boolean {
  return (
    isTag(node) &&
    ['w:t', 'w:tab', 'w:ptab', 'w:br', 'w:cr', 'w:noBreakHyphen'].includes(node.name)
  );
}

export function textOf(element: Element): string {
  return element.children
    .filter(isText)
    .map((node) => node.data)
    .join('');
}

export function runText(element: Element): string {
  return element.children.map(runChildText).join('');
}

export function childElement(parent: Element, name: string): Element | undefined {
  return parent.children.find((node): node is Element => isTag(node) && node.name === name);
}

/**
 * Runs of a paragraph in reading order, skipping runs already marked as deleted
 */
export function readRuns(paragraph: ParagraphBlock): Run[] {
  const runs: Run[] = [];
  collectRuns(paragraph.element, runs);
  return runs;
}

function collectRuns(container: Element, runs: Run[]): void {
  for (const child of container.children) {
    if (!isTag(child)) continue;
    if (child.name === 'w:r') {
      runs.push({ text: runText(child), element: child });
    } else if (VISIBLE_RUN_CONTAINERS.has(child.name)) {
      collectRuns(child, runs);
    }
  }
}

function unwrap(container: Element, name: string): Element[] {
  const found: Element[] = [];
  for (const child of container.children) {
    if (!isTag(child)) continue;
    if (child.name === name) {
      found.push(child);
    } else if (BLOCK_WRAPPERS.has(child.name)) {
      found.push(...unwrap(child, name));
    }
  }
  return found;
}

function readTable(table: Element, paragraphs: ParagraphBlock[]): TableBlock {
  return {
    kind: 'table',
    element: table,
    rows: unwrap(table, 'w:tr').map((row) => ({
      cells: unwrap(row, 'w:tc').map((cell) => ({ blocks: readBlocks(cell, paragraphs) })),
    })),
  };
}

function readBlocks(container: Element, paragraphs: ParagraphBlock[]): Block[] {
  const blocks: Block[] = [];
  for (const child of container.children) {
    if (!isTag(child)) continue;
    if (child.name === 'w:p') {
      const paragraph: ParagraphBlock = { kind: 'paragraph', id: paragraphs.length, element: child };
      paragraphs.push(paragraph);
      blocks.push(paragraph);
    } else if (child.name === 'w:tbl') {
      blocks.push(readTable(child, paragraphs));
    } else if (BLOCK_WRAPPERS.has(child.name)) {
      blocks.push(...readBlocks(child, paragraphs));
    }
  }
  return blocks;
}

/**
 * Visit every paragraph in document order, descending into table cells
 */
export function forEachParagraph(blocks: Block[], visit: (paragraph: ParagraphBlock) => void): void {
  for (const block of blocks) {
    switch (block.kind) {
      case 'paragraph':
        visit(block);
        break;
      case 'table':
        for (const row of block.rows) {
          for (const cell of row.cells) {
            forEachParagraph(cell.blocks, visit);
          }
        }
        break;
    }
  }
}

function findElement(nodes: AnyNode[], name: string): Element | undefined {
  for (const node of nodes) {
    if (!isTag(node)) continue;
    if (node.name === name) return node;
    const nested = findElement(node.children, name);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Hands out w:id values for new revision marks, above every id already in the part
 */
export class RevisionIdAllocator {
  private nextId: number;

  constructor(start: number) {
    this.nextId = start;
  }

  static fromNodes(nodes: AnyNode[]): RevisionIdAllocator {
    let max = 0;
    const stack = [...nodes];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || !isTag(node)) continue;
      const id = Number(node.attribs['w:id']);
      if (Number.isInteger(id) && id > max) max = id;
      stack.push(...node.children);
    }
    return new RevisionIdAllocator(max + 1);
  }

  allocate(): string {
    const id = this.nextId;
    this.nextId += 1;
    return String(id);
  }
}

export function parseDocumentXml(xml: string): DocumentModel {
  const $ = cheerio.load(xml, { xmlMode: true });
  const rootNodes = $.root().get(0)?.children ?? [];
  const body = findElement(rootNodes, 'w:body');
  if (!body) {
    throw AppError.invalidDocument('word/document.xml has no <w:body>');
  }

  const paragraphs: ParagraphBlock[] = [];
  const blocks = readBlocks(body, paragraphs);

  return {
    $,
    blocks,
    paragraphs,
    revisions: RevisionIdAllocator.fromNodes(rootNodes),
  };
}

export function serializeDocument(model: DocumentModel): string {
  return model.$.xml();
}

export function createElement(name: string, attribs: Record<string, string> = {}): Element {
  return new Element(name, { ...attribs });
}

/**
 * Replace all children of a <w:t>/<w:delText> with a single text node
 */
export function setText(element: Element, text: string): void {
  for (const child of [...element.children]) {
    removeElement(child);
  }
  element.attribs['xml:space'] = 'preserve';
  appendChild(element, new Text(text));
}

export function createText(text: string): Element {
  const t = createElement('w:t');
  setText(t, text);
  return t;
}

export function createTextRun(text: string, formatting?: Element): Element {
  const run = createElement('w:r');
  if (formatting) appendChild(run, cloneFormatting(formatting));
  appendChild(run, createText(text));
  return run;
}

/**
 * Deep copy of a run's <w:rPr>, without any recorded formatting revision
 */
export function cloneFormatting(rPr: Element): Element {
  const copy = cloneNode(rPr, true);
  const change = childElement(copy, 'w:rPrChange');
  if (change) removeElement(change);
  return copy;
}
