/**
 * Logger Types
 *
 * Type definitions for the logging pipeline: levels, the record model,
 * the capability interfaces (filter, formatter, handler) and the
 * configuration shapes that bind them together.
 */
import type { Writable } from 'node:stream';

/**
 * Log severity levels, least to most severe.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * All levels in ascending order of severity.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];

/**
 * Numeric priority for log levels.
 * Higher numbers = more severe.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARNING: 30,
    ERROR: 40,
    CRITICAL: 50,
};

/**
 * Deployment environments that select a configuration preset.
 */
export type Environment = 'development' | 'testing' | 'staging' | 'production';

/**
 * Call site of a log statement.
 */
export interface RecordOrigin {

    /** Source file name without extension */
    module: string;

    /** Enclosing function, `<anonymous>` at top level */
    function: string;

    /** 1-based line number, 0 when unknown */
    line: number;
}

/**
 * An error captured as data on a record.
 */
export interface CapturedError {

    /** Error name (`TypeError`) or `typeof` for non-Error throws */
    type: string;

    message: string;

    /** Stack lines, each starting with `at ` */
    frames: string[];
}

/**
 * A single log event.
 *
 * Records are frozen at construction. Filters that sanitize a record
 * return a new one.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "INFO",
 *     "logger": "api.orders",
 *     "message": "Order placed",
 *     "module": "orders",
 *     "function": "placeOrder",
 *     "line": 42,
 *     "context": { "requestId": "r-1" },
 *     "extra": { "orderId": 7 }
 * }
 * ```
 */
export interface LogRecord {
    readonly timestamp: Date;
    readonly level: LogLevel;
    readonly logger: string;
    readonly message: string;
    readonly origin: Readonly<RecordOrigin>;
    readonly context: Readonly<Record<string, unknown>>;
    readonly extra: Readonly<Record<string, unknown>>;
    readonly error?: Readonly<CapturedError>;
}

/**
 * Result of a filter stage.
 */
export type FilterResult =
    | { keep: true; record: LogRecord }
    | { keep: false };

/**
 * Pipeline stage that vetoes or sanitizes a record.
 */
export interface LogFilter {

    /** Stable identifier, part of the config fingerprint */
    readonly name: string;

    apply(record: LogRecord): FilterResult;
}

/**
 * Renders a record as a single output string (no trailing newline).
 */
export interface LogFormatter {
    readonly name: string;
    render(record: LogRecord): string;
}

/**
 * Sink-owning consumer of records.
 *
 * A handler applies its own level threshold, so it can be stricter
 * than the logger but never more permissive.
 */
export interface LogHandler {
    readonly name: string;
    readonly level: LogLevel;
    handle(record: LogRecord): void;
    close(): void;
}

/**
 * Color behaviour of the console formatter.
 *
 * - auto: colors when the target stream is an interactive terminal
 * - on: always
 * - off: never
 */
export type ColorMode = 'auto' | 'on' | 'off';

/**
 * Formatter selection inside a handler spec.
 */
export type FormatterSpec = 'json' | 'console' | LogFormatter;

interface BaseHandlerSpec {

    /** Handler threshold; defaults to DEBUG (defer to the logger) */
    level?: LogLevel;

    formatter: FormatterSpec;
}

export interface StreamHandlerSpec extends BaseHandlerSpec {
    kind: 'stream';
    stream?: 'stdout' | 'stderr' | Writable;
    colors?: ColorMode;
}

export interface RotatingFileHandlerSpec extends BaseHandlerSpec {
    kind: 'rotating-file';
    path: string;

    /** Size threshold, e.g. '10mb' */
    maxSize: string;

    backupCount: number;
}

export interface DailyFileHandlerSpec extends BaseHandlerSpec {
    kind: 'daily-file';
    path: string;
    backupCount: number;
}

export interface CustomHandlerSpec {
    kind: 'custom';
    handler: LogHandler;
}

/**
 * Data description of a handler, turned into a LogHandler when a
 * logger is constructed.
 */
export type HandlerSpec =
    | StreamHandlerSpec
    | RotatingFileHandlerSpec
    | DailyFileHandlerSpec
    | CustomHandlerSpec;

/**
 * Immutable logger configuration.
 */
export interface LoggerConfig {
    readonly name: string;
    readonly environment: Environment;
    readonly level: LogLevel;
    readonly handlers: readonly HandlerSpec[];
    readonly filters: readonly LogFilter[];
}

/**
 * Rotation result.
 */
export interface RotationResult {

    /** Whether rotation occurred */
    rotated: boolean;

    /** Backup file the active file was renamed to (if rotated) */
    backup?: string;

    /** Backups deleted during cleanup */
    deletedFiles?: string[];
}
