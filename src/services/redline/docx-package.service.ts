/**
 * DOCX Package Service
 * Loads, validates and re-packs the .docx ZIP container around word/document.xml
 */

import JSZip from 'jszip';
import * as cheerio from 'cheerio';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import { append, prependChild } from 'domutils';
import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { memoryConfig } from '../../config/memory.config';
import { assertWithinLimit } from '../../utils/memory-safe-processor';
import { createElement } from './document-model';

export const DOCUMENT_PART = 'word/document.xml';
export const SETTINGS_PART = 'word/settings.xml';
const CONTENT_TYPES_PART = '[Content_Types].xml';

const MACRO_PARTS = ['word/vbaProject.bin', 'vbaProject.bin', 'word/vbaData.xml'];

// Settings children that must come before <w:trackRevisions> in CT_Settings order
const BEFORE_TRACK_REVISIONS = new Set([
  'w:writeProtection',
  'w:view',
  'w:zoom',
  'w:removePersonalInformation',
  'w:removeDateAndTime',
  'w:doNotDisplayPageBoundaries',
  'w:displayBackgroundShape',
  'w:printPostScriptOverText',
  'w:printFractionalCharacterWidth',
  'w:printFormsData',
  'w:embedTrueTypeFonts',
  'w:embedSystemFonts',
  'w:saveSubsetFonts',
  'w:saveFormsData',
  'w:mirrorMargins',
  'w:alignBordersAndEdges',
  'w:bordersDoNotSurroundHeader',
  'w:bordersDoNotSurroundFooter',
  'w:gutterAtTop',
  'w:hideSpellingErrors',
  'w:hideGrammaticalErrors',
  'w:activeWritingStyle',
  'w:proofState',
  'w:formsDesign',
  'w:attachedTemplate',
  'w:linkStyles',
  'w:stylePaneFormatFilter',
  'w:stylePaneSortMethod',
  'w:documentType',
  'w:mailMerge',
  'w:revisionView',
]);

export interface DocxPackage {
  zip: JSZip;
  documentXml: string;
}

export interface SaveOptions {
  trackRevisions?: boolean;
}

/**
 * Remove DOCTYPE and ENTITY declarations so no entity is ever expanded
 */
export function sanitizeXML(xml: string): string {
  return xml
    .replace(/<!DOCTYPE[^>[]*(\[[\s\S]*?\])?\s*>/gi, '')
    .replace(/<!ENTITY[^>]*>/gi, '');
}

export function validateDOCXStructure(zip: JSZip): { valid: boolean; error?: string } {
  for (const file of [DOCUMENT_PART, CONTENT_TYPES_PART]) {
    if (!zip.file(file)) {
      return { valid: false, error: `Missing required file: ${file}` };
    }
  }

  const entries = Object.keys(zip.files);
  if (entries.length > memoryConfig.maxZipEntries) {
    return {
      valid: false,
      error: `Too many files in archive: ${entries.length} (max: ${memoryConfig.maxZipEntries})`,
    };
  }

  for (const entry of entries) {
    if (entry.includes('..') || entry.startsWith('/') || entry.includes('://')) {
      return { valid: false, error: `Invalid file path detected: ${entry}` };
    }
  }

  for (const part of MACRO_PARTS) {
    if (zip.file(part)) {
      return { valid: false, error: 'Macro-enabled documents are not supported' };
    }
  }

  return { valid: true };
}

/**
 * Add <w:trackRevisions/> to a settings part, at its schema position.
 * Returns the part unchanged when it is already on or has no <w:settings> root.
 */
export function enableTrackRevisions(settingsXml: string): string {
  const $ = cheerio.load(settingsXml, { xmlMode: true });
  const settings = $.root()
    .children()
    .toArray()
    .find((node): node is Element => isTag(node) && node.name === 'w:settings');
  if (!settings) return settingsXml;

  const children = settings.children.filter(isTag);
  if (children.some((child) => child.name === 'w:trackRevisions')) return settingsXml;

  const marker = createElement('w:trackRevisions');
  const predecessors = children.filter((child) => BEFORE_TRACK_REVISIONS.has(child.name));
  const anchor = predecessors[predecessors.length - 1];
  if (anchor) {
    append(anchor, marker);
  } else {
    prependChild(settings, marker);
  }
  return $.xml();
}

class DocxPackageService {
  async load(buffer: Buffer): Promise<DocxPackage> {
    assertWithinLimit(buffer.length, memoryConfig.maxUploadFileSize, 'DOCX file');

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      logger.warn('[DOCX Package] Could not open archive', error);
      throw AppError.invalidDocument('file is not a ZIP archive');
    }

    const structure = validateDOCXStructure(zip);
    if (!structure.valid) {
      throw AppError.invalidDocument(structure.error || 'unknown structure error');
    }

    const documentFile = zip.file(DOCUMENT_PART);
    if (!documentFile) {
      throw AppError.invalidDocument(`${DOCUMENT_PART} not found`);
    }
    const documentXml = await documentFile.async('string');
    assertWithinLimit(documentXml.length, memoryConfig.maxXmlMemorySize, 'Document XML');

    logger.debug(`[DOCX Package] Loaded ${Object.keys(zip.files).length} entries`);
    return { zip, documentXml: sanitizeXML(documentXml) };
  }

  /**
   * Write the edited document part back and pack the archive
   */
  async save(pkg: DocxPackage, documentXml: string, options: SaveOptions = {}): Promise<Buffer> {
    pkg.zip.file(DOCUMENT_PART, documentXml);

    if (options.trackRevisions) {
      const settingsFile = pkg.zip.file(SETTINGS_PART);
      if (settingsFile) {
        const settingsXml = sanitizeXML(await settingsFile.async('string'));
        pkg.zip.file(SETTINGS_PART, enableTrackRevisions(settingsXml));
      } else {
        logger.warn(`[DOCX Package] ${SETTINGS_PART} missing; track changes not switched on`);
      }
    }

    return pkg.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }
}

export const docxPackageService = new DocxPackageService();
