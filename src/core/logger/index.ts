/**
 * Logger Module
 *
 * Structured, leveled, redacted logging with a composable
 * filter → formatter → handler pipeline.
 *
 * Features:
 * - Async-scope context merged into every record
 * - Key-based redaction of sensitive fields
 * - Console, size-rotating and daily-rotating sinks
 * - Environment presets and a cached logger factory
 */

// Types
export type {
    LogLevel,
    Environment,
    RecordOrigin,
    CapturedError,
    LogRecord,
    FilterResult,
    LogFilter,
    LogFormatter,
    LogHandler,
    ColorMode,
    FormatterSpec,
    HandlerSpec,
    StreamHandlerSpec,
    RotatingFileHandlerSpec,
    DailyFileHandlerSpec,
    CustomHandlerSpec,
    LoggerConfig,
    RotationResult,
} from './types.js';

export { LOG_LEVELS, LOG_LEVEL_PRIORITY } from './types.js';

// Errors
export { LoggerConfigurationError, HandlerError } from './errors.js';

// Records
export {
    RESERVED_ATTRIBUTES,
    isReservedAttribute,
    sanitizeFields,
    captureError,
    captureOrigin,
    createRecord,
    type RecordInput,
} from './record.js';

// Redaction
export {
    REDACTION_SENTINEL,
    DEFAULT_SENSITIVE_KEYS,
    addSensitiveKeys,
    resetSensitiveKeys,
    getSensitiveKeys,
    isSensitiveKey,
    redactFields,
} from './redact.js';

// Filters
export { LevelFilter, SensitiveDataFilter, runFilters, isLevelEnabled } from './filters.js';

// Formatters
export {
    JsonFormatter,
    ConsoleFormatter,
    createFormatter,
    toJsonLine,
    type JsonLogLine,
} from './formatter.js';

// Rotation
export { parseSize } from './rotation.js';

// Handlers
export {
    BaseHandler,
    StreamHandler,
    RotatingFileHandler,
    DailyRotatingFileHandler,
    MemoryHandler,
    createHandler,
    type HandlerOptions,
    type RotatingFileOptions,
    type DailyFileOptions,
} from './handlers.js';

// Context
export {
    ContextStore,
    contextStore,
    withContext,
    getContext,
    type ContextToken,
} from './context.js';

// Configuration
export { validateLoggerConfig, parseLogEnv } from './schema.js';
export {
    DEFAULT_LOG_DIR,
    resolveEnvironment,
    createPresetConfig,
    configFromEnvironment,
    type PresetOptions,
} from './presets.js';

// Logger
export { Logger, type LoggerOptions, type LogFields } from './logger.js';

// Factory
export {
    LoggerRegistry,
    defaultRegistry,
    getLogger,
    clearLoggers,
    fingerprintConfig,
    type GetLoggerOptions,
    type RegistryOptions,
} from './factory.js';
