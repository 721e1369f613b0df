import { config } from '../../config';
import { AppError } from '../../utils/app-error';
import { redlinePolicySchema } from '../../schemas/finding.schemas';
import type { RedlinePolicyInput } from '../../schemas/finding.schemas';
import type { RedlineMode, RedlinePolicy } from '../../types/redline.types';
import type { ResolveOptions } from './span-resolver';

/**
 * Caller policy merged over the configured defaults
 */
export function resolvePolicy(input: RedlinePolicyInput = {}): RedlinePolicy {
  const parsed = redlinePolicySchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw AppError.badRequest(`Invalid redline policy: ${detail}`, 'INVALID_POLICY');
  }
  const defaults = config.redline;
  return {
    ignoreCase: parsed.data.ignoreCase ?? defaults.ignoreCase,
    skipIfSame: parsed.data.skipIfSame ?? defaults.skipIfSame,
    author: parsed.data.author ?? defaults.author,
    fuzzyThreshold: parsed.data.fuzzyThreshold ?? defaults.fuzzyThreshold,
    onAmbiguous: parsed.data.onAmbiguous ?? defaults.onAmbiguous,
    trackedGranularity: parsed.data.trackedGranularity ?? defaults.trackedGranularity,
  };
}

/**
 * Tracked output always falls back to case-insensitive matching; clean output only
 * when the policy asks for it.
 */
export function resolveOptionsFor(mode: RedlineMode, policy: RedlinePolicy): ResolveOptions {
  return {
    ignoreCase: mode === 'tracked' || policy.ignoreCase,
    fuzzyThreshold: policy.fuzzyThreshold,
  };
}
