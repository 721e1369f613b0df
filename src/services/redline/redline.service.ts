/**
 * Redline Service
 *
 * Entry point for applying reviewer findings to a .docx: either one variant (tracked
 * changes or clean replacement) or both at once from the same source bytes.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../../lib/logger';
import { withMemoryTracking } from '../../utils/memory-safe-processor';
import { batchOrchestrator, summarize } from './batch-orchestrator.service';
import { docxPackageService } from './docx-package.service';
import { parseDocumentXml, serializeDocument } from './document-model';
import { resolvePolicy } from './redline-policy';
import type { RedlinePolicyInput } from '../../schemas/finding.schemas';
import type { RedlineMode, RedlinePair, RedlineResult } from '../../types/redline.types';

export interface RedlineOptions {
  policy?: RedlinePolicyInput;
  /** Revision timestamp; defaults to the time of the call */
  now?: Date;
}

export interface RedlineFileOutputs {
  tracked?: string;
  clean?: string;
}

/**
 * Write through a sibling temp file so the target is either the old file or the new one
 */
async function writeFileAtomic(target: string, data: Buffer): Promise<void> {
  const temp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(temp, data);
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

class RedlineService {
  /**
   * Apply findings to a .docx in one mode
   */
  async applyFindings(
    buffer: Buffer,
    findings: unknown,
    mode: RedlineMode,
    options: RedlineOptions = {}
  ): Promise<RedlineResult> {
    const policy = resolvePolicy(options.policy);
    const now = options.now ?? new Date();

    const pkg = await docxPackageService.load(buffer);
    const model = parseDocumentXml(pkg.documentXml);
    const outcomes = batchOrchestrator.process(model, findings, mode, policy, now);
    const output = await docxPackageService.save(pkg, serializeDocument(model), {
      trackRevisions: mode === 'tracked',
    });

    return { buffer: output, outcomes, summary: summarize(outcomes) };
  }

  /**
   * Tracked and clean variants from the same source, each on its own copy of the package
   */
  async generate(buffer: Buffer, findings: unknown, options: RedlineOptions = {}): Promise<RedlinePair> {
    return withMemoryTracking('Redline generate', async () => {
      const now = options.now ?? new Date();
      const [tracked, clean] = await Promise.all([
        this.applyFindings(buffer, findings, 'tracked', { ...options, now }),
        this.applyFindings(buffer, findings, 'clean', { ...options, now }),
      ]);

      logger.info(`[Redline] Generated tracked and clean variants: ${clean.summary.message}`);
      return { tracked, clean };
    });
  }

  /**
   * Read a .docx from disk and write the requested variants. Outputs are written only
   * after both variants have been produced.
   */
  async redlineFile(
    inputPath: string,
    outputs: RedlineFileOutputs,
    findings: unknown,
    options: RedlineOptions = {}
  ): Promise<RedlinePair> {
    const source = await fs.readFile(inputPath);
    const pair = await this.generate(source, findings, options);

    if (outputs.tracked) {
      await writeFileAtomic(outputs.tracked, pair.tracked.buffer);
      logger.info(`[Redline] Wrote tracked document to ${outputs.tracked}`);
    }
    if (outputs.clean) {
      await writeFileAtomic(outputs.clean, pair.clean.buffer);
      logger.info(`[Redline] Wrote clean document to ${outputs.clean}`);
    }
    return pair;
  }
}

export const redlineService = new RedlineService();
