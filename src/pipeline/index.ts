/**
 * Pipeline exports
 */

export {
  PipelineOrchestrator,
  buildHistoryContext,
  type PipelineDependencies,
  type GenerationHistory,
  type Enhancer,
  type ArtifactGenerator,
  type KeywordExtractor
} from './PipelineOrchestrator.js';
export { PromptEnhancer, FALLBACK_ENHANCE_TEMPLATE, type PromptEnhancerOptions } from './PromptEnhancer.js';
export { TagExtractor, extractTags, MAX_TAGS, STOP_WORDS } from './TagExtractor.js';
export { formatPipelineMessage, parsePipelineMessage, type ParsedPipelineMessage } from './formatResult.js';
