import { describe, it, expect } from 'vitest';
import {
  RevisionIdAllocator,
  cloneFormatting,
  forEachParagraph,
  parseDocumentXml,
  readRuns,
  serializeDocument,
} from '../../../../src/services/redline/document-model';
import { documentText, flatten, locate, searchableText } from '../../../../src/services/redline/document-flattener';
import { AppError } from '../../../../src/utils/app-error';
import { BOLD, W_NS, documentXml, elementsNamed, modelOf, paragraph, run, table } from '../../../helpers/docx-fixtures';

describe('document-model', () => {
  it('reads paragraphs and nested tables in document order', () => {
    const model = modelOf(
      paragraph(run('Intro')),
      table([
        [paragraph(run('A1')), table([[paragraph(run('Inner'))]])],
        [paragraph(run('B1')), paragraph(run('B2'))],
      ]),
      paragraph(run('Outro'))
    );

    const seen: string[] = [];
    forEachParagraph(model.blocks, (p) => seen.push(`${p.id}:${flatten(p).text}`));

    expect(seen).toEqual(['0:Intro', '1:A1', '2:Inner', '3:B1', '4:B2', '5:Outro']);
    expect(model.blocks.map((block) => block.kind)).toEqual(['paragraph', 'table', 'paragraph']);
  });

  it('maps tabs, breaks and non-breaking hyphens into the visible text', () => {
    const model = modelOf(
      paragraph('<w:r><w:t>Term</w:t><w:tab/><w:t>two</w:t><w:noBreakHyphen/><w:t>year</w:t><w:br/></w:r>')
    );

    expect(flatten(model.paragraphs[0]).text).toBe('Term\ttwo-year\n');
  });

  it('skips deleted runs and reads inserted, hyperlinked and content-control runs', () => {
    const model = modelOf(
      paragraph(
        run('Keep '),
        `<w:del w:id="3" w:author="x" w:date="2024-01-01T00:00:00Z"><w:r><w:delText>gone </w:delText></w:r></w:del>`,
        `<w:ins w:id="4" w:author="x" w:date="2024-01-01T00:00:00Z">${run('added ')}</w:ins>`,
        `<w:hyperlink w:anchor="s1">${run('link ')}</w:hyperlink>`,
        `<w:sdt><w:sdtContent>${run('control')}</w:sdtContent></w:sdt>`
      )
    );

    expect(readRuns(model.paragraphs[0]).map((r) => r.text)).toEqual(['Keep ', 'added ', 'link ', 'control']);
  });

  it('reads paragraphs wrapped in block-level content controls', () => {
    const model = modelOf(`<w:sdt><w:sdtContent>${paragraph(run('Wrapped'))}</w:sdtContent></w:sdt>`);

    expect(documentText(model)).toBe('Wrapped');
  });

  it('starts revision ids above the highest existing id', () => {
    const model = modelOf(
      paragraph(`<w:ins w:id="41" w:author="x" w:date="2024-01-01T00:00:00Z">${run('a')}</w:ins>`),
      paragraph('<w:bookmarkStart w:id="7" w:name="b"/>', run('b'))
    );

    expect(model.revisions.allocate()).toBe('42');
    expect(model.revisions.allocate()).toBe('43');
  });

  it('starts at 1 when the part has no ids', () => {
    expect(new RevisionIdAllocator(1).allocate()).toBe('1');
    expect(modelOf(paragraph(run('x'))).revisions.allocate()).toBe('1');
  });

  it('rejects XML without a body', () => {
    const parse = () => parseDocumentXml(`<w:document xmlns:w="${W_NS}"/>`);

    expect(parse).toThrow(AppError);
    expect(parse).toThrow('Invalid DOCX structure: word/document.xml has no <w:body>');
  });

  it('serializes untouched markup back unchanged', () => {
    const xml = documentXml(paragraph(run('Plain text', BOLD)));

    expect(serializeDocument(parseDocumentXml(xml))).toBe(xml);
  });

  it('cloneFormatting drops recorded formatting changes', () => {
    const model = modelOf(
      paragraph(run('x', '<w:rPr><w:b/><w:rPrChange w:id="9" w:author="x"><w:rPr/></w:rPrChange></w:rPr>'))
    );
    const [rPr] = elementsNamed(model, 'w:rPr');

    const copy = cloneFormatting(rPr);

    expect(copy.children.map((child) => ('name' in child ? child.name : ''))).toEqual(['w:b']);
    expect(rPr.children).toHaveLength(2);
  });
});

describe('document-flattener', () => {
  it('records run segments and locates offsets', () => {
    const model = modelOf(paragraph(run('The '), run('Recipient', BOLD), run(' shall')));
    const { text, index } = flatten(model.paragraphs[0]);

    expect(text).toBe('The Recipient shall');
    expect(index.segments.map(({ start, end }) => [start, end])).toEqual([
      [0, 4],
      [4, 13],
      [13, 19],
    ]);
    expect(locate(index, 4)).toEqual({ runIndex: 1, runOffset: 0 });
    expect(locate(index, 12)).toEqual({ runIndex: 1, runOffset: 8 });
    expect(locate(index, 19)).toBeNull();
  });

  it('joins paragraphs with newlines', () => {
    const model = modelOf(paragraph(run('One')), paragraph(), paragraph(run('Two')));

    expect(documentText(model)).toBe('One\n\nTwo');
  });

  it('blanks out excluded runs without moving offsets', () => {
    const model = modelOf(paragraph(run('Keep '), run('new'), run(' text')));
    const p = model.paragraphs[0];
    const written = new Set([readRuns(p)[1].element]);

    expect(searchableText(p, written)).toBe('Keep \u0000\u0000\u0000 text');
    expect(searchableText(p)).toBe('Keep new text');
  });
});
