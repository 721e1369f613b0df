/**
 * Batch Orchestrator
 *
 * Drives a list of findings over one document model. Every finding is located against the
 * document as submitted, then applied in document order. Just before it is applied a
 * finding is resolved again, in its original paragraph first, with the text written by
 * earlier findings of the same pass hidden from the search.
 */

import type { Element } from 'domhandler';
import { logger } from '../../lib/logger';
import { findingsService } from './findings.service';
import { applyEdit, formatRevisionDate } from './edit-applicator';
import { resolve, resolveInDocument } from './span-resolver';
import type { ResolveOptions } from './span-resolver';
import { searchableText } from './document-flattener';
import { normalizeFinding } from './text-normalizer';
import { resolveOptionsFor } from './redline-policy';
import type { DocumentModel } from './document-model';
import type {
  EditOutcome,
  MatchSpan,
  NormalizedFinding,
  RedlineMode,
  RedlinePolicy,
  RedlineSummary,
} from '../../types/redline.types';

interface PendingFinding {
  order: number;
  normalized: NormalizedFinding;
  position: MatchSpan | null;
  /** Exact or case-insensitive occurrences in the document as submitted */
  occurrences: number;
}

function comparePending(a: PendingFinding, b: PendingFinding): number {
  if (a.position && b.position) {
    return (
      a.position.paragraphId - b.position.paragraphId ||
      a.position.start - b.position.start ||
      a.order - b.order
    );
  }
  if (a.position) return -1;
  if (b.position) return 1;
  return a.order - b.order;
}

export function summarize(outcomes: EditOutcome[]): RedlineSummary {
  const count = (status: EditOutcome['status']) =>
    outcomes.filter((outcome) => outcome.status === status).length;

  const applied = count('applied');
  const skippedNotFound = count('skipped-not-found');
  const skippedUnchanged = count('skipped-unchanged');
  const skippedAmbiguous = count('skipped-ambiguous');

  let message = `${applied} applied, ${skippedNotFound} not found`;
  if (skippedUnchanged > 0) message += `, ${skippedUnchanged} unchanged`;
  if (skippedAmbiguous > 0) message += `, ${skippedAmbiguous} ambiguous`;

  return {
    total: outcomes.length,
    applied,
    skippedNotFound,
    skippedUnchanged,
    skippedAmbiguous,
    message,
  };
}

class BatchOrchestratorService {
  /**
   * Apply every finding to the model in place. Outcomes come back in input order.
   * Only malformed input throws; a finding that cannot be applied becomes an outcome.
   */
  process(
    model: DocumentModel,
    findings: unknown,
    mode: RedlineMode,
    policy: RedlinePolicy,
    now: Date = new Date()
  ): EditOutcome[] {
    const validated = findingsService.validateFindings(findings);
    const options = resolveOptionsFor(mode, policy);
    const date = formatRevisionDate(now);
    const outcomes: EditOutcome[] = new Array(validated.length);

    const pending: PendingFinding[] = [];
    validated.forEach((finding, order) => {
      const normalized = normalizeFinding(finding);
      if (!normalized.citation) {
        outcomes[order] = { findingId: finding.id, status: 'skipped-not-found' };
        return;
      }
      const resolution = resolveInDocument(model, normalized.citation, options);
      pending.push({
        order,
        normalized,
        position: resolution ? resolution.span : null,
        occurrences: resolution ? resolution.occurrences : 0,
      });
    });

    pending.sort(comparePending);

    const written = new Set<Element>();
    for (const item of pending) {
      outcomes[item.order] = this.applyOne(model, item, mode, policy, date, written);
    }

    logger.info(`[Redline] ${mode} pass: ${summarize(outcomes).message}`);
    return outcomes;
  }

  private applyOne(
    model: DocumentModel,
    pending: PendingFinding,
    mode: RedlineMode,
    policy: RedlinePolicy,
    date: string,
    written: Set<Element>
  ): EditOutcome {
    const { normalized, position, occurrences } = pending;
    const findingId = normalized.finding.id;

    if (position && occurrences > 1 && policy.onAmbiguous === 'skip') {
      logger.debug(`[Redline] Finding ${findingId}: ${occurrences} occurrences, skipped`);
      return { findingId, status: 'skipped-ambiguous', span: position };
    }

    const options = resolveOptionsFor(mode, policy);
    const span = this.relocate(model, normalized.citation, position, options, written);
    if (!span) {
      logger.debug(`[Redline] Finding ${findingId}: citation not found`);
      return { findingId, status: 'skipped-not-found' };
    }

    const paragraph = model.paragraphs[span.paragraphId];
    const outcome = applyEdit({ model, paragraph, span, date, written }, normalized, mode, policy);
    logger.debug(`[Redline] Finding ${findingId}: ${outcome.status}`, {
      paragraphId: span.paragraphId,
      confidence: span.confidence,
      score: span.score,
    });
    return outcome;
  }

  /**
   * Current span of a citation: its original paragraph first, then the whole document.
   * Text written earlier in the pass is never matched.
   */
  private relocate(
    model: DocumentModel,
    citation: string,
    position: MatchSpan | null,
    options: ResolveOptions,
    written: ReadonlySet<Element>
  ): MatchSpan | null {
    if (position) {
      const paragraph = model.paragraphs[position.paragraphId];
      const span = resolve(searchableText(paragraph, written), citation, options, position.paragraphId);
      if (span) return span;
    }
    return resolveInDocument(model, citation, options, written)?.span ?? null;
  }
}

export const batchOrchestrator = new BatchOrchestratorService();
