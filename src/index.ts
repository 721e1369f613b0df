export { redlineService } from './services/redline/redline.service';
export type { RedlineOptions, RedlineFileOutputs } from './services/redline/redline.service';
export { batchOrchestrator, summarize } from './services/redline/batch-orchestrator.service';
export { findingsService } from './services/redline/findings.service';
export type { FindingSelection } from './services/redline/findings.service';
export { docxPackageService } from './services/redline/docx-package.service';
export { resolvePolicy } from './services/redline/redline-policy';
export { parseDocumentXml, serializeDocument } from './services/redline/document-model';
export type { DocumentModel, Block, ParagraphBlock, TableBlock, Run } from './services/redline/document-model';
export { flatten, paragraphText, documentText } from './services/redline/document-flattener';
export { resolve, resolveInDocument } from './services/redline/span-resolver';
export { isolate, splitRunAt } from './services/redline/run-splitter';
export { applyEdit } from './services/redline/edit-applicator';
export { normalize, normalizeFinding, stripMarkup } from './services/redline/text-normalizer';
export { AppError } from './utils/app-error';
export { FileTooLargeError } from './utils/memory-safe-processor';
export type {
  Finding,
  FindingPriority,
  RedlineMode,
  RedlinePolicy,
  MatchSpan,
  EditOutcome,
  EditStatus,
  RedlineSummary,
  RedlineResult,
  RedlinePair,
} from './types/redline.types';
export type {
  ReviewerReport,
  EditSpec,
  RedlinePolicyInput,
} from './schemas/finding.schemas';
