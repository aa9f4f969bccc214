/**
 * Logger
 *
 * The object application code calls. Each call builds a record with the
 * active context, runs it through the filter pipeline and hands it to
 * every handler. Calls are synchronous and never throw: pipeline
 * failures are published as `logger:error` on the observer.
 *
 * @example
 * ```typescript
 * const logger = new Logger(createPresetConfig('api', 'staging'))
 *
 * logger.info('Order placed', { orderId: 7 })
 *
 * await withContext({ requestId: 'r1' }, () =>
 *     logger.measureTime('charge', () => payments.charge(order), { orderId: 7 }),
 * )
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import { ContextStore, contextStore as defaultContextStore } from './context.js';
import { LoggerConfigurationError } from './errors.js';
import { LevelFilter, SensitiveDataFilter, isLevelEnabled, runFilters } from './filters.js';
import { createHandler } from './handlers.js';
import { captureError, captureOrigin, createRecord } from './record.js';
import { validateLoggerConfig } from './schema.js';
import type {
    CapturedError,
    Environment,
    LogFilter,
    LogHandler,
    LogLevel,
    LoggerConfig,
    RecordOrigin,
} from './types.js';

/**
 * Caller-supplied fields for a single call.
 */
export type LogFields = Record<string, unknown>;

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Context store to read from; the process-wide store by default */
    contextStore?: ContextStore;
}

/**
 * Logger orchestrating record construction, filters and handlers.
 */
export class Logger {

    readonly #config: LoggerConfig;
    readonly #context: ContextStore;
    readonly #filters: readonly LogFilter[];
    readonly #handlers: readonly LogHandler[];
    #closed = false;

    /**
     * @throws LoggerConfigurationError when the config is invalid or a
     * handler cannot open its sink
     */
    constructor(config: LoggerConfig, options: LoggerOptions = {}) {

        validateLoggerConfig(config);

        this.#config = config;
        this.#context = options.contextStore ?? defaultContextStore;
        this.#handlers = buildHandlers(config);

        // Level gate first; redaction always runs even when not configured
        const hasRedaction = config.filters.some((filter) => filter instanceof SensitiveDataFilter);

        this.#filters = [
            new LevelFilter(config.level),
            ...config.filters,
            ...(hasRedaction ? [] : [new SensitiveDataFilter()]),
        ];

        attemptSync(() => observer.emit('logger:created', {
            name: config.name,
            environment: config.environment,
            level: config.level,
        }));

    }

    get name(): string {

        return this.#config.name;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    get environment(): Environment {

        return this.#config.environment;

    }

    get config(): LoggerConfig {

        return this.#config;

    }

    get handlers(): readonly LogHandler[] {

        return this.#handlers;

    }

    get closed(): boolean {

        return this.#closed;

    }

    /**
     * Check if a record at `level` would pass the logger threshold.
     */
    isEnabledFor(level: LogLevel): boolean {

        return isLevelEnabled(level, this.#config.level);

    }

    debug(message: string, fields?: LogFields): void {

        this.#log('DEBUG', message, fields);

    }

    info(message: string, fields?: LogFields): void {

        this.#log('INFO', message, fields);

    }

    warning(message: string, fields?: LogFields): void {

        this.#log('WARNING', message, fields);

    }

    /**
     * Log at ERROR, optionally capturing `error`.
     */
    error(message: string, fields?: LogFields, error?: unknown): void {

        this.#log('ERROR', message, fields, error === undefined ? undefined : captureError(error));

    }

    /**
     * Log at CRITICAL, optionally capturing `error`.
     */
    critical(message: string, fields?: LogFields, error?: unknown): void {

        this.#log('CRITICAL', message, fields, error === undefined ? undefined : captureError(error));

    }

    /**
     * Log at ERROR with the caught error and its stack.
     *
     * @example
     * ```typescript
     * try {
     *     await riskyOperation()
     * }
     * catch (err) {
     *     logger.exception('Failed to process', err, { operation: 'risky' })
     * }
     * ```
     */
    exception(message: string, error: unknown, fields?: LogFields): void {

        this.#log('ERROR', message, fields, captureError(error));

    }

    /**
     * Log at any level.
     */
    log(level: LogLevel, message: string, fields?: LogFields, error?: unknown): void {

        this.#log(level, message, fields, error === undefined ? undefined : captureError(error));

    }

    /**
     * Time `fn` and log its outcome.
     *
     * Logs DEBUG `Starting <operation>` first. When `fn` returns (or its
     * promise resolves) logs INFO `Completed <operation>` with `durationMs`;
     * when it throws (or rejects) logs a single ERROR `Failed <operation>`
     * with `durationMs` and the error, then rethrows the original error.
     *
     * @example
     * ```typescript
     * const rows = await logger.measureTime('database_query', () => db.select(), { table: 'users' })
     * ```
     */
    measureTime<T>(operation: string, fn: () => Promise<T>, fields?: LogFields): Promise<T>;
    measureTime<T>(operation: string, fn: () => T, fields?: LogFields): T;
    measureTime<T>(operation: string, fn: () => T | Promise<T>, fields: LogFields = {}): T | Promise<T> {

        const start = performance.now();
        const scope = { ...fields, operation };

        // Settlement callbacks run without the caller on the stack
        const origin = captureOrigin();

        const completed = () => {

            this.#log('INFO', `Completed ${operation}`, { ...scope, durationMs: elapsedSince(start) }, undefined, origin);

        };

        const failed = (error: unknown) => {

            this.#log('ERROR', `Failed ${operation}`, { ...scope, durationMs: elapsedSince(start) }, captureError(error), origin);

        };

        this.#log('DEBUG', `Starting ${operation}`, scope, undefined, origin);

        let result: T | Promise<T>;

        try {

            result = fn();

        }
        catch (error) {

            failed(error);
            throw error;

        }

        if (isPromise(result)) {

            return result.then(
                (value: T) => {

                    completed();

                    return value;

                },
                (error: unknown) => {

                    failed(error);
                    throw error;

                },
            );

        }

        completed();

        return result;

    }

    /**
     * Close every handler. Later calls are ignored.
     */
    close(): void {

        if (this.#closed) {

            return;

        }

        this.#closed = true;

        for (const handler of this.#handlers) {

            const [, err] = attemptSync(() => handler.close());

            if (err) {

                this.#report(err);

            }

        }

    }

    #log(
        level: LogLevel,
        message: string,
        fields?: LogFields,
        error?: CapturedError,
        origin?: RecordOrigin,
    ): void {

        if (this.#closed || !this.isEnabledFor(level)) {

            return;

        }

        const site = origin ?? captureOrigin();

        const [, err] = attemptSync(() => {

            const record = createRecord({
                level,
                logger: this.#config.name,
                message,
                context: this.#context.current(),
                extra: fields,
                error,
                origin: site,
            });

            const filtered = runFilters(this.#filters, record);

            if (!filtered) {

                return;

            }

            for (const handler of this.#handlers) {

                const [, handlerErr] = attemptSync(() => handler.handle(filtered));

                if (handlerErr) {

                    attemptSync(() => observer.emit('handler:error', { handler: handler.name, error: handlerErr }));

                }

            }

        });

        if (err) {

            this.#report(err);

        }

    }

    #report(error: Error): void {

        attemptSync(() => observer.emit('logger:error', { name: this.#config.name, error }));

    }

}

/**
 * Build handlers from specs, closing the ones already opened if a
 * later one fails.
 */
function buildHandlers(config: LoggerConfig): LogHandler[] {

    const handlers: LogHandler[] = [];

    for (const spec of config.handlers) {

        const [handler, err] = attemptSync(() => createHandler(spec));

        if (err) {

            for (const opened of handlers) {

                attemptSync(() => opened.close());

            }

            throw new LoggerConfigurationError(
                `Cannot configure logger '${config.name}': ${err.message}`,
                [],
                { cause: err },
            );

        }

        handlers.push(handler);

    }

    return handlers;

}

function isPromise<T>(value: T | Promise<T>): value is Promise<T> {

    return value instanceof Promise;

}

function elapsedSince(start: number): number {

    return Math.max(0, Math.round((performance.now() - start) * 1000) / 1000);

}
