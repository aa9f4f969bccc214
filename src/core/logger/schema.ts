/**
 * Logger configuration Zod schemas and validation.
 *
 * Configuration problems are the one class of logging error that is
 * surfaced to the caller, so they are checked up front when a logger
 * is built.
 */
import { Writable } from 'node:stream';

import { attemptSync } from '@logosdx/utils';
import { z } from 'zod';

import { LoggerConfigurationError } from './errors.js';
import { parseSize } from './rotation.js';
import type { LogFilter, LogFormatter, LogHandler, LoggerConfig } from './types.js';

/**
 * Valid log levels.
 */
export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']);

/**
 * Valid deployment environments.
 */
export const EnvironmentSchema = z.enum(['development', 'testing', 'staging', 'production']);

/**
 * Logging-related environment variables.
 *
 * Values are case-insensitive. Empty strings count as unset.
 */
export const LogEnvSchema = z.object({
    ENVIRONMENT: z.string().trim().toLowerCase().pipe(EnvironmentSchema).optional(),
    LOG_LEVEL: z.string().trim().toUpperCase().pipe(LogLevelSchema).optional(),
    LOG_DIR: z.string().trim().min(1).optional(),
});

export type LogEnv = z.infer<typeof LogEnvSchema>;

// ─────────────────────────────────────────────────────────────
// Capability checks
// ─────────────────────────────────────────────────────────────

function hasMethod(value: unknown, method: string): boolean {

    return typeof value === 'object'
        && value !== null
        && method in value
        && typeof Reflect.get(value, method) === 'function';

}

const FormatterInstanceSchema = z.custom<LogFormatter>(
    (value) => hasMethod(value, 'render'),
    { message: 'Formatter must implement render()' },
);

const HandlerInstanceSchema = z.custom<LogHandler>(
    (value) => hasMethod(value, 'handle') && hasMethod(value, 'close'),
    { message: 'Handler must implement handle() and close()' },
);

const FilterInstanceSchema = z.custom<LogFilter>(
    (value) => hasMethod(value, 'apply'),
    { message: 'Filter must implement apply()' },
);

// ─────────────────────────────────────────────────────────────
// Handler specs
// ─────────────────────────────────────────────────────────────

const FormatterSpecSchema = z.union([z.enum(['json', 'console']), FormatterInstanceSchema]);

const SizeSchema = z.string().refine(
    (size) => !attemptSync(() => parseSize(size))[1],
    (size) => ({ message: `Invalid size format: ${size}` }),
);

const BackupCountSchema = z.number().int().min(0, 'Backup count cannot be negative');

export const HandlerSpecSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('stream'),
        level: LogLevelSchema.optional(),
        formatter: FormatterSpecSchema,
        stream: z.union([
            z.enum(['stdout', 'stderr']),
            z.custom<Writable>((value) => value instanceof Writable, { message: 'Stream must be writable' }),
        ]).optional(),
        colors: z.enum(['auto', 'on', 'off']).optional(),
    }),
    z.object({
        kind: z.literal('rotating-file'),
        level: LogLevelSchema.optional(),
        formatter: FormatterSpecSchema,
        path: z.string().min(1, 'Log file path is required'),
        maxSize: SizeSchema,
        backupCount: BackupCountSchema,
    }),
    z.object({
        kind: z.literal('daily-file'),
        level: LogLevelSchema.optional(),
        formatter: FormatterSpecSchema,
        path: z.string().min(1, 'Log file path is required'),
        backupCount: BackupCountSchema,
    }),
    z.object({
        kind: z.literal('custom'),
        handler: HandlerInstanceSchema,
    }),
]);

/**
 * Complete logger configuration.
 */
export const LoggerConfigSchema = z.object({
    name: z.string().min(1, 'Logger name is required'),
    environment: EnvironmentSchema,
    level: LogLevelSchema,
    handlers: z.array(HandlerSpecSchema),
    filters: z.array(FilterInstanceSchema),
});

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Throw a LoggerConfigurationError for the first issue of a failed parse.
 */
function fail(prefix: string, error: z.ZodError): never {

    const firstIssue = error.issues[0];
    const field = firstIssue?.path.join('.') || 'unknown';

    throw new LoggerConfigurationError(
        `${prefix} (${field}): ${firstIssue?.message ?? 'Validation failed'}`,
        error.issues,
    );

}

/**
 * Validate a logger config.
 *
 * @throws LoggerConfigurationError if validation fails
 *
 * @example
 * ```typescript
 * const [, err] = attemptSync(() => validateLoggerConfig(config))
 * if (err) {
 *     console.error(`Invalid logger config: ${err.message}`)
 * }
 * ```
 */
export function validateLoggerConfig(config: unknown): asserts config is LoggerConfig {

    const result = LoggerConfigSchema.safeParse(config);

    if (!result.success) {

        fail('Invalid logger config', result.error);

    }

}

/**
 * Parse the logging environment variables.
 *
 * @throws LoggerConfigurationError on an unknown environment or level
 */
export function parseLogEnv(env: NodeJS.ProcessEnv = process.env): LogEnv {

    const input = {
        ENVIRONMENT: env['ENVIRONMENT'] || undefined,
        LOG_LEVEL: env['LOG_LEVEL'] || undefined,
        LOG_DIR: env['LOG_DIR'] || undefined,
    };

    const result = LogEnvSchema.safeParse(input);

    if (!result.success) {

        fail('Invalid logging environment', result.error);

    }

    return result.data;

}
