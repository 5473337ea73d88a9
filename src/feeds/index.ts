/**
 * Herald — Feeds Module
 *
 * Source adapters, deduplication, classification and the collection pass.
 */

export { safeCollect, firstLine, type SourceAdapter, type SourceAdapters, type SourceFetchResult } from './base';

export {
  Deduplicator,
  computeContentHash,
  deduplicateInMemory,
  fingerprint,
  normalizeText,
  type BatchDedupResult,
  type DeduplicatorOptions,
} from './dedup';

export { ContentFilter, hasSignificantChange, isNewsworthyChat, isNewsworthyRepositoryEvent } from './filter';

export { runCollection, type CollectionResult, type CollectorConfig, type CollectorDeps } from './aggregator';

export { createSources } from './sources';
