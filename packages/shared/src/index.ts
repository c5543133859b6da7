/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runInChildContext,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export {
  logger,
  serializeError,
  routeLogsToStderr,
  type LogContext,
  type LogLevel,
} from './logger';

// Config
export {
  loadConfig,
  resolvePipelineSettings,
  DEFAULT_VISION_FALLBACK_MODEL,
  type Config,
  type ModelTarget,
  type PipelineSettings,
} from './config';

// Errors
export {
  ContractDeltaError,
  EmptyModelResponseError,
  PageExtractionError,
  PageReadError,
  SchemaValidationError,
  ContextualizationError,
  ChangeExtractionError,
  ConfigurationError,
  UsageError,
  isContractDeltaError,
  type ErrorCode,
} from './errors';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type CompareContractJob,
  type QueueCountsSource,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  enableDefaultMetrics,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  pageExtractionsCounter,
  stageDurationHistogram,
  comparisonsCounter,
  queueDepthGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueDepth,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  SCHEMA_FILES,
  validateContextualizedPair,
  validateChangeSummary,
  validateComparisonRecord,
  decodeContextualizedPair,
  decodeChangeSummary,
  decodeComparisonRecord,
  parseJson,
  type ValidationResult,
} from './schemas';

// Tracing
export { withSpan } from './tracing';

// LLM
export type {
  ChatContentPart,
  ChatMessage,
  ResponseSchema,
  ModelRequest,
  ModelCompletion,
  ModelClient,
} from './llm/types';
export {
  MESSAGE_STYLES,
  isMessageStyle,
  resolveMessageStyle,
  buildMessages,
  buildVisionMessages,
  type MessageStyle,
} from './llm/message-style';
export { renderTemplate, messageText } from './llm/prompt';
export { OpenAIModelClient, type OpenAIModelClientOptions } from './llm/openai-client';

// Templates
export {
  PAGE_EXTRACTION_TEMPLATE,
  CONTEXTUALIZATION_TEMPLATE,
  CHANGE_EXTRACTION_TEMPLATE,
  type PromptTemplate,
  type TemplateStage,
} from './templates';

// Pipeline
export type { StageDeps } from './pipeline/deps';
export { mapWithConcurrency } from './pipeline/concurrency';
export { extractPage, toDataUrl } from './pipeline/page-extractor';
export { assembleDocument, listPageImages, mimeTypeFor } from './pipeline/document-assembler';
export { contextualize } from './pipeline/contextualizer';
export { extractChanges } from './pipeline/change-extractor';
export {
  runComparison,
  type RunnerDeps,
  type StageObserver,
} from './pipeline/runner';
