export { loadConfig, type AppConfig } from './config.js';
export * from './errors.js';
export { createLogger, logger, type Logger } from './middleware/logger.js';
export { redactHeaders, redactText, redactUrl } from './middleware/redact.js';
export * from './providers/index.js';
export { createStreamDecoder, ProviderStreamDecoder, type StreamFormat } from './providers/stream-parsers/index.js';
export {
  ConfigurationSchema,
  MessageSchema,
  ProviderSettingsSchema,
  type Configuration,
  type ProviderKind,
  type ProviderSettings,
  type ProviderSettingsInput,
} from './schemas/request.js';
export { BackgroundRunner, type BackgroundTask, type StreamDecoder } from './services/background-runner.js';
export { createClientCredentialsExchange } from './services/client-credentials.js';
export { LLMService, type LLMServiceOptions, type ServiceQueryOptions } from './services/llm-service.js';
export {
  DEFAULT_TIMEOUTS,
  EXTENDED_TIMEOUTS,
  RequestExecutor,
  selectTimeoutPolicy,
} from './services/request-executor.js';
export { TokenCache, normalizeExpiry, type CachedToken, type TokenState } from './services/token-cache.js';
export * from './transport/index.js';
export { buildServer, createService } from './server.js';
