import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { findingsService } from '../../../../src/services/redline/findings.service';
import { logger } from '../../../../src/lib/logger';
import { AppError } from '../../../../src/utils/app-error';
import { makeFinding } from '../../../helpers/docx-fixtures';

describe('FindingsService', () => {
  describe('validateFindings', () => {
    it('returns well-formed findings unchanged', () => {
      const findings = [makeFinding(1, 'shall pay', 'may pay')];

      expect(findingsService.validateFindings(findings)).toEqual(findings);
    });

    it('lists every issue in the error message', () => {
      expect(() => findingsService.validateFindings([{ id: 1.5, priority: 'High' }])).toThrow(
        /Invalid findings: 0\.id: Finding id must be an integer;.*0\.citation: Citation is required/
      );
    });

    it('rejects a non-array', () => {
      expect(() => findingsService.validateFindings({ id: 1 })).toThrow(AppError);
    });
  });

  describe('flattenReviewerReport', () => {
    it('numbers findings across High, Medium and Low priority', () => {
      const findings = findingsService.flattenReviewerReport({
        'Low Priority': [{ section: '9', issue: 'Typo', citation: 'recieve', suggested_replacement: 'receive' }],
        'High Priority': [
          { section: '4', issue: 'Penalty', problem: 'Uncapped', citation: 'pay €50,000', suggested_replacement: '' },
        ],
        'Medium Priority': [{ section: 7, issue: 'Term', citation: 'perpetual', suggested_replacement: null }],
      });

      expect(findings).toEqual([
        {
          id: 1,
          priority: 'High',
          section: '4',
          issue: 'Penalty',
          problem: 'Uncapped',
          citation: 'pay €50,000',
          suggestedReplacement: '',
        },
        {
          id: 2,
          priority: 'Medium',
          section: '7',
          issue: 'Term',
          problem: '',
          citation: 'perpetual',
          suggestedReplacement: '',
        },
        {
          id: 3,
          priority: 'Low',
          section: '9',
          issue: 'Typo',
          problem: '',
          citation: 'recieve',
          suggestedReplacement: 'receive',
        },
      ]);
    });

    it('treats missing sections as empty', () => {
      expect(findingsService.flattenReviewerReport({})).toEqual([]);
    });
  });

  describe('selectFindings', () => {
    const findings = [makeFinding(1, 'a', 'b'), { ...makeFinding(2, 'c', 'd'), priority: 'Low' as const }];

    it('selects by id', () => {
      expect(findingsService.selectFindings(findings, { ids: [2] }).map((f) => f.id)).toEqual([2]);
    });

    it('selects by list position ahead of ids', () => {
      expect(findingsService.selectFindings(findings, { indices: [1], ids: [1] }).map((f) => f.id)).toEqual([2]);
    });

    it('selects by predicate', () => {
      expect(findingsService.selectFindings(findings, { where: (f) => f.priority === 'High' }).map((f) => f.id)).toEqual([1]);
    });

    it('returns everything without a selection', () => {
      expect(findingsService.selectFindings(findings)).toHaveLength(2);
    });
  });

  describe('applyEditSpec', () => {
    const findings = [1, 2, 3, 4].map((id) => makeFinding(id, `citation ${id}`, `replacement ${id}`));

    it('keeps only accepted findings by default', () => {
      const kept = findingsService.applyEditSpec(findings, { accept: [1, 3] });

      expect(kept.map((f) => f.id)).toEqual([1, 3]);
    });

    it('lets discard win over accept and accept-all', () => {
      const kept = findingsService.applyEditSpec(findings, { acceptAllByDefault: true, accept: [2], discard: [2, 4] });

      expect(kept.map((f) => f.id)).toEqual([1, 3]);
    });

    it('keeps overridden findings with the new replacement', () => {
      const kept = findingsService.applyEditSpec(findings, {
        discard: [4],
        overrides: { '4': { suggestedReplacement: 'reviewer wording' }, '2': {} },
      });

      expect(kept.map((f) => [f.id, f.suggestedReplacement])).toEqual([
        [2, 'replacement 2'],
        [4, 'reviewer wording'],
      ]);
    });

    it('locates an overridden finding by its citation hint', () => {
      const kept = findingsService.applyEditSpec(findings, {
        overrides: { '3': { citationHint: 'the quoted clause' }, '1': { citationHint: '   ' } },
      });

      expect(kept.map((f) => [f.id, f.citation, f.suggestedReplacement])).toEqual([
        [1, 'citation 1', 'replacement 1'],
        [3, 'the quoted clause', 'replacement 3'],
      ]);
    });

    it('rejects override keys that are not finding ids', () => {
      expect(() => findingsService.applyEditSpec(findings, { overrides: { first: {} } })).toThrow(
        'Override keys must be finding ids'
      );
    });
  });

  describe('mergeCleanedFindings', () => {
    const raw = [makeFinding(1, 'raw one', 'fix one'), makeFinding(2, 'raw two', 'fix two')];

    it('replaces citation and replacement with the cleaned values', () => {
      const merged = findingsService.mergeCleanedFindings(raw, [
        { id: 1, citation_clean: 'clean one', suggested_replacement_clean: '  better one ' },
      ]);

      expect(merged[0]).toMatchObject({ id: 1, citation: 'clean one', suggestedReplacement: 'better one' });
      expect(merged[1]).toBe(raw[1]);
    });

    it('keeps the raw finding when the cleaned citation is empty', () => {
      const merged = findingsService.mergeCleanedFindings(raw, [
        { id: '2', citation_clean: '  ', suggested_replacement_clean: 'ignored' },
      ]);

      expect(merged[1]).toBe(raw[1]);
    });

    it('keeps the raw replacement when the cleaned one is blank', () => {
      const merged = findingsService.mergeCleanedFindings(raw, [{ id: 2, citation_clean: 'clean two' }]);

      expect(merged[1]).toMatchObject({ citation: 'clean two', suggestedReplacement: 'fix two' });
    });

    it('warns about and ignores malformed entries', () => {
      const merged = findingsService.mergeCleanedFindings(raw, [{ id: 'abc', citation_clean: 'x' }]);

      expect(merged).toEqual(raw);
      expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('[Findings] Ignoring cleaned finding at index 0'));
    });
  });
});
