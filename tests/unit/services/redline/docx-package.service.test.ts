import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import * as cheerio from 'cheerio';
import JSZip from 'jszip';
import { isTag } from 'domhandler';
import {
  docxPackageService,
  enableTrackRevisions,
  sanitizeXML,
  validateDOCXStructure,
} from '../../../../src/services/redline/docx-package.service';
import { AppError } from '../../../../src/utils/app-error';
import { SETTINGS_XML, W_NS, buildDocx, documentXml, paragraph, readPart, run } from '../../../helpers/docx-fixtures';

function settingsChildren(xml: string): string[] {
  const $ = cheerio.load(xml, { xmlMode: true });
  return $.root()
    .find('*')
    .toArray()
    .filter((node) => node.parent !== null && isTag(node.parent))
    .map((node) => node.name);
}

describe('DocxPackageService', () => {
  describe('sanitizeXML', () => {
    it('removes DOCTYPE declarations with an internal subset', () => {
      const xml = '<?xml version="1.0"?><!DOCTYPE d [<!ENTITY x SYSTEM "file:///etc/passwd">]><d>&x;</d>';

      expect(sanitizeXML(xml)).toBe('<?xml version="1.0"?><d>&x;</d>');
    });

    it('leaves percent signs in text alone', () => {
      expect(sanitizeXML('<w:t>interest at 5%plus;</w:t>')).toBe('<w:t>interest at 5%plus;</w:t>');
    });
  });

  describe('validateDOCXStructure', () => {
    it('accepts a minimal package', async () => {
      const zip = await JSZip.loadAsync(await buildDocx(paragraph(run('x'))));

      expect(validateDOCXStructure(zip)).toEqual({ valid: true });
    });

    it('requires [Content_Types].xml', async () => {
      const zip = new JSZip();
      zip.file('word/document.xml', documentXml(''));

      expect(validateDOCXStructure(zip)).toEqual({ valid: false, error: 'Missing required file: [Content_Types].xml' });
    });

    it('rejects macro-enabled documents', async () => {
      const zip = await JSZip.loadAsync(
        await buildDocx(paragraph(run('x')), { extraFiles: { 'word/vbaProject.bin': 'macro' } })
      );

      expect(validateDOCXStructure(zip)).toEqual({ valid: false, error: 'Macro-enabled documents are not supported' });
    });
  });

  describe('enableTrackRevisions', () => {
    it('inserts the flag at its schema position', () => {
      expect(settingsChildren(enableTrackRevisions(SETTINGS_XML))).toEqual([
        'w:zoom',
        'w:trackRevisions',
        'w:defaultTabStop',
      ]);
    });

    it('puts the flag first when no earlier setting exists', () => {
      const xml = `<w:settings xmlns:w="${W_NS}"><w:defaultTabStop w:val="720"/></w:settings>`;

      expect(settingsChildren(enableTrackRevisions(xml))).toEqual(['w:trackRevisions', 'w:defaultTabStop']);
    });

    it('leaves settings that already track revisions unchanged', () => {
      const xml = `<w:settings xmlns:w="${W_NS}"><w:trackRevisions/></w:settings>`;

      expect(enableTrackRevisions(xml)).toBe(xml);
    });
  });

  describe('load', () => {
    it('returns the document part', async () => {
      const pkg = await docxPackageService.load(await buildDocx(paragraph(run('Hello'))));

      expect(pkg.documentXml).toBe(documentXml(paragraph(run('Hello'))));
    });

    it('rejects bytes that are not a ZIP archive', async () => {
      await expect(docxPackageService.load(Buffer.from('not a zip'))).rejects.toMatchObject({
        code: 'INVALID_DOCX_STRUCTURE',
        statusCode: 400,
        message: 'Invalid DOCX structure: file is not a ZIP archive',
      });
    });

    it('rejects a package without word/document.xml', async () => {
      const zip = new JSZip();
      zip.file('[Content_Types].xml', '<Types/>');
      const buffer = await zip.generateAsync({ type: 'nodebuffer' });

      await expect(docxPackageService.load(buffer)).rejects.toThrow(AppError);
      await expect(docxPackageService.load(buffer)).rejects.toThrow('Missing required file: word/document.xml');
    });
  });

  describe('save', () => {
    it('writes the document part and turns on revision tracking on request', async () => {
      const pkg = await docxPackageService.load(await buildDocx(paragraph(run('Hello'))));
      const edited = documentXml(paragraph(run('Goodbye')));

      const output = await docxPackageService.save(pkg, edited, { trackRevisions: true });

      expect(await readPart(output, 'word/document.xml')).toBe(edited);
      expect(settingsChildren(await readPart(output, 'word/settings.xml'))).toContain('w:trackRevisions');
    });

    it('does not touch settings otherwise', async () => {
      const pkg = await docxPackageService.load(await buildDocx(paragraph(run('Hello'))));

      const output = await docxPackageService.save(pkg, pkg.documentXml);

      expect(await readPart(output, 'word/settings.xml')).toBe(SETTINGS_XML);
    });

    it('saves without settings.xml present', async () => {
      const pkg = await docxPackageService.load(await buildDocx(paragraph(run('Hello')), { settingsXml: null }));

      const output = await docxPackageService.save(pkg, pkg.documentXml, { trackRevisions: true });

      const zip = await JSZip.loadAsync(output);
      expect(zip.file('word/settings.xml')).toBeNull();
    });
  });
});
