import { describe, it, expect } from 'vitest';
import { resolveOptionsFor, resolvePolicy } from '../../../../src/services/redline/redline-policy';
import { config } from '../../../../src/config';
import { TEST_POLICY } from '../../../helpers/docx-fixtures';

describe('redline-policy', () => {
  it('fills every field from configuration', () => {
    expect(resolvePolicy()).toEqual({
      ignoreCase: config.redline.ignoreCase,
      skipIfSame: config.redline.skipIfSame,
      author: config.redline.author,
      fuzzyThreshold: config.redline.fuzzyThreshold,
      onAmbiguous: config.redline.onAmbiguous,
      trackedGranularity: config.redline.trackedGranularity,
    });
  });

  it('lets caller values win over configuration', () => {
    const policy = resolvePolicy({ author: 'Legal Ops', skipIfSame: false, trackedGranularity: 'word' });

    expect(policy).toMatchObject({ author: 'Legal Ops', skipIfSame: false, trackedGranularity: 'word' });
    expect(policy.fuzzyThreshold).toBe(config.redline.fuzzyThreshold);
  });

  it('rejects an out-of-range threshold', () => {
    expect(() => resolvePolicy({ fuzzyThreshold: 1.5 })).toThrow(
      'Invalid redline policy: fuzzyThreshold: Fuzzy threshold must be at most 1'
    );
  });

  it('rejects a blank author', () => {
    expect(() => resolvePolicy({ author: '   ' })).toThrow('Author is required');
  });

  it('always allows case-insensitive matching in tracked mode', () => {
    expect(resolveOptionsFor('tracked', TEST_POLICY)).toEqual({ ignoreCase: true, fuzzyThreshold: 0.8 });
    expect(resolveOptionsFor('clean', TEST_POLICY)).toEqual({ ignoreCase: false, fuzzyThreshold: 0.8 });
    expect(resolveOptionsFor('clean', { ...TEST_POLICY, ignoreCase: true }).ignoreCase).toBe(true);
  });
});
