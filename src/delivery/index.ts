/**
 * Herald — Delivery Module
 *
 * Rendering, the weekly digest and summarizer, destination adapters and the
 * publish coordinator.
 */

export {
  KIND_EMOJI,
  cleanTitle,
  destinationLimit,
  hashtagsFor,
  renderActivityMarkdown,
  renderCandidate,
  textLength,
  truncate,
  type RenderOptions,
} from './formatter';

export {
  buildDigest,
  buildSummaryPrompt,
  buildSummarySystemPrompt,
  describeActivity,
  formatWindow,
  groupByKind,
  type DigestOptions,
} from './digest';

export { AnthropicSummarizer, type AnthropicSummarizerConfig, type Summarizer } from './summarizer';

export {
  PublishCoordinator,
  backoffDelay,
  postSignature,
  type CoordinatorDeps,
  type PublishOptions,
} from './coordinator';

export * from './destinations';
