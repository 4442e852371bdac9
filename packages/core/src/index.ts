export {
  createLogger,
  createLoggerOptions,
  generateCorrelationId,
  type Logger,
  type LoggerOptions,
  type LoggerConfig,
  type LogContext,
} from './logger/index.js';

export { redactString, REDACTION_PATHS } from './logger/redaction.js';

export {
  AppError,
  NotFoundError,
  FailureError,
  ValidationError,
  ForbiddenError,
  ConcurrencyError,
  UnexpectedError,
  ERROR_KIND_STATUS,
  toSafeErrorResponse,
  type ErrorKind,
  type ErrorParams,
  type SafeErrorDetails,
} from './errors.js';

export { Ok, Err, isOk, isErr, type Result } from './types/result.js';

// Database client and unit of work
export {
  createDatabaseClient,
  closeDatabasePools,
  pingDatabase,
  withTransaction,
  withAdvisoryLock,
  stringToLockKey,
  IsolationLevel,
  SerializationError,
  DeadlockError,
  type DatabaseClient,
  type DatabasePool,
  type DatabaseConfig,
  type PoolClient,
  type QueryResult,
  type TransactionClient,
  type TransactionOptions,
} from './database.js';

export {
  ServerEnvSchema,
  DatabaseEnvSchema,
  CorsEnvSchema,
  EnvValidationError,
  validateEnv,
  parseList,
  type ServerEnv,
  type DatabaseEnv,
} from './env.js';

export {
  classifyMethod,
  isMethodAllowed,
  parseServiceType,
  type MethodCategory,
} from './service-type.js';

export {
  Localizer,
  negotiateLocale,
  SUPPORTED_LOCALES,
  DEFAULT_LOCALE,
  type SupportedLocale,
  type MessageParams,
  type LocalizerOptions,
} from './localization.js';

// Telemetry (OpenTelemetry API; no-op until an SDK is registered)
export {
  getTracer,
  createSpan,
  withResultSpan,
  SpanAttributes,
  SpanStatusCode,
  type Span,
  type Tracer,
  type SpanOptions,
  type SpanAttributeOptions,
} from './telemetry.js';
