/**
 * Findings intake: validation at the engine boundary, plus the reviewer-side helpers that
 * turn a compliance report into the finding list handed to the engine.
 */

import type { ZodError } from 'zod';
import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import {
  cleanedFindingSchema,
  editSpecSchema,
  findingListSchema,
  reviewerReportSchema,
} from '../../schemas/finding.schemas';
import type { CleanedFinding, EditSpec, ReviewerReport } from '../../schemas/finding.schemas';
import type { Finding, FindingPriority } from '../../types/redline.types';

const REPORT_SECTIONS: Array<{ key: 'High Priority' | 'Medium Priority' | 'Low Priority'; priority: FindingPriority }> = [
  { key: 'High Priority', priority: 'High' },
  { key: 'Medium Priority', priority: 'Medium' },
  { key: 'Low Priority', priority: 'Low' },
];

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export interface FindingSelection {
  /** Zero-based positions in the list; takes precedence over ids and where */
  indices?: Iterable<number>;
  ids?: Iterable<number>;
  where?: (finding: Finding) => boolean;
}

class FindingsService {
  /**
   * Validate an untyped finding list. Throws INVALID_FINDING before any document work starts.
   */
  validateFindings(input: unknown): Finding[] {
    const parsed = findingListSchema.safeParse(input);
    if (!parsed.success) {
      throw AppError.unprocessable(`Invalid findings: ${describeIssues(parsed.error)}`, 'INVALID_FINDING');
    }
    return parsed.data;
  }

  /**
   * Flatten a reviewer report into findings numbered 1..n across High, Medium, Low
   */
  flattenReviewerReport(report: ReviewerReport): Finding[] {
    const parsed = reviewerReportSchema.safeParse(report);
    if (!parsed.success) {
      throw AppError.unprocessable(`Invalid reviewer report: ${describeIssues(parsed.error)}`, 'INVALID_FINDING');
    }

    const findings: Finding[] = [];
    for (const { key, priority } of REPORT_SECTIONS) {
      for (const item of parsed.data[key]) {
        findings.push({
          id: findings.length + 1,
          priority,
          section: item.section,
          issue: item.issue,
          problem: item.problem,
          citation: item.citation,
          suggestedReplacement: item.suggested_replacement,
        });
      }
    }
    return findings;
  }

  selectFindings(findings: Finding[], selection: FindingSelection = {}): Finding[] {
    if (selection.indices !== undefined) {
      const positions = new Set(selection.indices);
      return findings.filter((_finding, index) => positions.has(index));
    }
    if (selection.ids !== undefined) {
      const ids = new Set(selection.ids);
      return findings.filter((finding) => ids.has(finding.id));
    }
    if (selection.where) {
      return findings.filter(selection.where);
    }
    return findings;
  }

  /**
   * Apply the reviewer's accept/discard decisions. Discard beats accept; an override keeps
   * the finding and may replace its suggested replacement. A non-blank citation hint
   * replaces the citation used to locate the finding.
   */
  applyEditSpec(findings: Finding[], spec: EditSpec): Finding[] {
    const result = editSpecSchema.safeParse(spec);
    if (!result.success) {
      throw AppError.unprocessable(`Invalid edit spec: ${describeIssues(result.error)}`, 'INVALID_FINDING');
    }
    const parsed = result.data;
    const accepted = new Set(parsed.accept);
    const discarded = new Set(parsed.discard);

    const selected: Finding[] = [];
    for (const finding of findings) {
      const override = parsed.overrides[String(finding.id)];
      let keep = parsed.acceptAllByDefault;
      if (accepted.has(finding.id)) keep = true;
      if (discarded.has(finding.id)) keep = false;
      if (override) keep = true;
      if (!keep) continue;

      if (!override) {
        selected.push(finding);
        continue;
      }
      const hint = override.citationHint?.trim();
      selected.push({
        ...finding,
        citation: hint ? hint : finding.citation,
        suggestedReplacement: override.suggestedReplacement ?? finding.suggestedReplacement,
      });
    }
    return selected;
  }

  /**
   * Merge the citation-cleaning pass back into the raw findings. Entries are matched by id;
   * one with an empty citation leaves the raw finding as it was.
   */
  mergeCleanedFindings(raw: Finding[], cleaned: unknown[]): Finding[] {
    const byId = new Map<number, CleanedFinding>();
    cleaned.forEach((entry, index) => {
      const parsed = cleanedFindingSchema.safeParse(entry);
      if (!parsed.success) {
        logger.warn(`[Findings] Ignoring cleaned finding at index ${index}: ${describeIssues(parsed.error)}`);
        return;
      }
      byId.set(parsed.data.id, parsed.data);
    });

    return raw.map((finding) => {
      const entry = byId.get(finding.id);
      if (!entry || !entry.citationClean.trim()) return finding;
      return {
        ...finding,
        citation: entry.citationClean,
        suggestedReplacement: entry.suggestedReplacementClean || finding.suggestedReplacement,
      };
    });
  }
}

export const findingsService = new FindingsService();
