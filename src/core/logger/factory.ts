/**
 * Logger Factory
 *
 * Resolves a logger name to one cached Logger per process, so sinks are
 * opened once. The registry is a plain object: tests create their own
 * or clear the default one between cases.
 *
 * @example
 * ```typescript
 * const logger = getLogger('api.orders')
 * getLogger('api.orders') === logger // true
 *
 * clearLoggers()
 * getLogger('api.orders') === logger // false
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import type { ContextStore } from './context.js';
import { LevelFilter, SensitiveDataFilter } from './filters.js';
import { Logger } from './logger.js';
import { configFromEnvironment, createPresetConfig, type PresetOptions } from './presets.js';
import type { Environment, FormatterSpec, HandlerSpec, LogFilter, LoggerConfig } from './types.js';

/**
 * Options for LoggerRegistry.get().
 *
 * Supplying any of them makes the request explicit: the cached logger
 * is reused only if the resolved config has the same fingerprint.
 */
export interface GetLoggerOptions extends PresetOptions {

    /** Full config; takes precedence over the preset options */
    config?: LoggerConfig;

    /** Preset to use instead of the ENVIRONMENT variable */
    environment?: Environment;
}

/**
 * Options for LoggerRegistry construction.
 */
export interface RegistryOptions {

    /** Environment variables to resolve presets from; process.env by default */
    env?: NodeJS.ProcessEnv;

    /** Context store handed to every logger built by this registry */
    contextStore?: ContextStore;
}

interface CachedInstance {
    logger: Logger;
    fingerprint: string;
}

// Stable ids for objects that cannot be serialized (streams, instances)
const objectIds = new WeakMap<object, number>();
let nextObjectId = 1;

function objectId(value: object): number {

    let id = objectIds.get(value);

    if (id === undefined) {

        id = nextObjectId++;
        objectIds.set(value, id);

    }

    return id;

}

function describeFormatter(formatter: FormatterSpec): string {

    return typeof formatter === 'string'
        ? formatter
        : `${formatter.name}#${objectId(formatter)}`;

}

function describeHandler(spec: HandlerSpec): Record<string, unknown> {

    switch (spec.kind) {

    case 'custom':
        return { kind: spec.kind, handler: `${spec.handler.name}#${objectId(spec.handler)}` };

    case 'stream':
        return {
            kind: spec.kind,
            level: spec.level,
            formatter: describeFormatter(spec.formatter),
            stream: typeof spec.stream === 'object' ? `writable#${objectId(spec.stream)}` : spec.stream ?? 'stdout',
            colors: spec.colors ?? 'auto',
        };

    default:
        return { ...spec, formatter: describeFormatter(spec.formatter) };

    }

}

/**
 * Built-in filters are described by their name, which encodes their
 * settings. Any other filter is told apart by identity.
 */
function describeFilter(filter: LogFilter): string {

    if (filter instanceof LevelFilter || filter instanceof SensitiveDataFilter) {

        return filter.name;

    }

    return `${filter.name}#${objectId(filter)}`;

}

/**
 * Content fingerprint of a config, used to decide whether a cached
 * logger satisfies a request.
 */
export function fingerprintConfig(config: LoggerConfig): string {

    return JSON.stringify({
        name: config.name,
        environment: config.environment,
        level: config.level,
        handlers: config.handlers.map(describeHandler),
        filters: config.filters.map(describeFilter),
    });

}

/**
 * Name-keyed cache of Logger instances.
 */
export class LoggerRegistry {

    #cache = new Map<string, CachedInstance>();

    readonly #env: NodeJS.ProcessEnv;
    readonly #contextStore: ContextStore | undefined;

    constructor(options: RegistryOptions = {}) {

        this.#env = options.env ?? process.env;
        this.#contextStore = options.contextStore;

    }

    /**
     * Get or create the logger for `name`.
     *
     * An explicit request whose config differs from the cached one builds
     * a new logger and closes the old one, releasing its files. Callers
     * still holding the old logger get no further output from it.
     *
     * @throws LoggerConfigurationError when a new logger cannot be built
     */
    get(name: string, options: GetLoggerOptions = {}): Logger {

        const cached = this.#cache.get(name);
        const explicit = Object.values(options).some((value) => value !== undefined);

        if (cached && !explicit) {

            return cached.logger;

        }

        const config = this.#resolveConfig(name, options);
        const fingerprint = fingerprintConfig(config);

        if (cached && cached.fingerprint === fingerprint) {

            return cached.logger;

        }

        const logger = new Logger(config, { contextStore: this.#contextStore });

        this.#cache.set(name, { logger, fingerprint });

        if (cached) {

            attemptSync(() => cached.logger.close());

        }

        return logger;

    }

    /**
     * Check whether a logger is cached under `name`.
     */
    has(name: string): boolean {

        return this.#cache.has(name);

    }

    /**
     * Number of cached loggers.
     */
    get size(): number {

        return this.#cache.size;

    }

    /**
     * Drop every cached logger and close its handlers.
     *
     * The cache is swapped in one assignment, so a get() never sees a
     * half-cleared registry.
     */
    clear(): void {

        const previous = this.#cache;

        this.#cache = new Map();

        for (const { logger } of previous.values()) {

            attemptSync(() => logger.close());

        }

    }

    #resolveConfig(name: string, options: GetLoggerOptions): LoggerConfig {

        if (options.config) {

            return options.config;

        }

        if (options.environment) {

            return createPresetConfig(name, options.environment, options, this.#env);

        }

        return configFromEnvironment(name, options, this.#env);

    }

}

/**
 * Process-wide registry used by getLogger() and clearLoggers().
 */
export const defaultRegistry = new LoggerRegistry();

/**
 * Get or create a logger from the process-wide registry.
 *
 * @param name - Logger name, dot-separated by convention
 * @param options - Explicit config or preset options
 * @returns Cached Logger instance
 */
export function getLogger(name: string, options?: GetLoggerOptions): Logger {

    return defaultRegistry.get(name, options);

}

/**
 * Clear the process-wide registry.
 *
 * Useful for testing to ensure clean state between tests.
 */
export function clearLoggers(): void {

    defaultRegistry.clear();

}
