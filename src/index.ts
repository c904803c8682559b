export { estimateTokens, TokenEstimator } from './filter/token-estimator.js';
export { findSections, MINIMAL_ENV_STUB } from './filter/section-extractor.js';
export { filterPrompt } from './filter/prompt-filter.js';
export { shouldFilter, DEFAULT_FILTER_MODELS } from './filter/filter-policy.js';
export {
  processRequest,
  parseChatRequest,
  reductionPercent,
  PASSTHROUGH_REASON,
} from './filter/request-filter.js';
export {
  EventReporter,
  renderEvents,
  previewText,
  DEFAULT_REPORTER_CONFIG,
} from './filter/event-reporter.js';
export type { FilterEvent, FilterEventType, ReporterConfig } from './filter/event-reporter.js';
export type {
  ChatMessage,
  ChatRequest,
  FilterOutcome,
  MessageOutcome,
  MessageRole,
  ProcessedRequest,
  RequestStats,
  RequestTotals,
  SectionKind,
  SectionMatch,
} from './filter/types.js';
export { InvalidRequestError, ConfigError, UpstreamError } from './errors.js';
export { ProxyConfigManager, ProxyConfigSchema, loadConfig } from './config/proxy-config.js';
export type { ProxyConfig } from './config/proxy-config.js';
export { EventLog } from './logging/event-log.js';
export { FilterLogger } from './logging/filter-logger.js';
export { UpstreamClient } from './ollama/upstream-client.js';
export { ProxyServer, startProxyServer } from './proxy/server.js';
