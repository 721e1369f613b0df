import type { AmbiguityHandling, TrackedGranularity } from '../config';

export type FindingPriority = 'High' | 'Medium' | 'Low';

export interface Finding {
  id: number;
  priority: FindingPriority;
  section: string;
  issue: string;
  problem: string;
  citation: string;
  suggestedReplacement: string;
}

export interface NormalizedFinding {
  finding: Finding;
  /** Folded citation used for matching; empty means unmatchable */
  citation: string;
  /** Folded replacement used for equality checks */
  replacement: string;
  /** Replacement as written into the document */
  replacementText: string;
}

export type RedlineMode = 'tracked' | 'clean';

export interface RedlinePolicy {
  ignoreCase: boolean;
  skipIfSame: boolean;
  author: string;
  fuzzyThreshold: number;
  onAmbiguous: AmbiguityHandling;
  trackedGranularity: TrackedGranularity;
}

export type MatchConfidence = 'exact' | 'case-insensitive' | 'fuzzy';

export interface MatchSpan {
  paragraphId: number;
  start: number;
  end: number;
  confidence: MatchConfidence;
  score: number;
}

export type EditStatus =
  | 'applied'
  | 'skipped-not-found'
  | 'skipped-unchanged'
  | 'skipped-ambiguous';

export interface EditOutcome {
  findingId: number;
  status: EditStatus;
  span?: MatchSpan;
}

export interface RedlineSummary {
  total: number;
  applied: number;
  skippedNotFound: number;
  skippedUnchanged: number;
  skippedAmbiguous: number;
  message: string;
}

export interface RedlineResult {
  buffer: Buffer;
  outcomes: EditOutcome[];
  summary: RedlineSummary;
}

export interface RedlinePair {
  tracked: RedlineResult;
  clean: RedlineResult;
}
