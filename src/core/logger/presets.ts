/**
 * Configuration Presets
 *
 * One preset per deployment environment. Presets share the pipeline
 * shape and differ only in level, handler set and rotation policy.
 *
 * | preset      | level   | handlers                                            |
 * |-------------|---------|-----------------------------------------------------|
 * | development | DEBUG   | stdout console (colors auto)                        |
 * | testing     | WARNING | stdout console (no colors)                          |
 * | staging     | INFO    | stdout JSON, size-rotating JSON file                |
 * | production  | INFO    | stdout JSON, daily JSON file, size-rotating errors  |
 */
import type { Writable } from 'node:stream';
import { join } from 'node:path';

import { SensitiveDataFilter } from './filters.js';
import { parseLogEnv } from './schema.js';
import type { Environment, HandlerSpec, LoggerConfig, LogLevel } from './types.js';

/**
 * Default directory for file handlers, relative to the working directory.
 */
export const DEFAULT_LOG_DIR = 'logs';

/**
 * Options that tune a preset without changing its shape.
 */
export interface PresetOptions {

    /** Directory for log files; LOG_DIR or `logs` when omitted */
    logDir?: string;

    /** Console stream; stdout when omitted */
    stream?: Writable;

    /** Level override; LOG_LEVEL or the preset level when omitted */
    level?: LogLevel;
}

const PRESET_LEVELS: Record<Environment, LogLevel> = {
    development: 'DEBUG',
    testing: 'WARNING',
    staging: 'INFO',
    production: 'INFO',
};

/**
 * Resolve the active environment.
 *
 * Reads `ENVIRONMENT` case-insensitively; defaults to development.
 *
 * @throws LoggerConfigurationError when ENVIRONMENT names no preset
 */
export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {

    return parseLogEnv(env).ENVIRONMENT ?? 'development';

}

/**
 * Handler specs for a preset.
 */
function presetHandlers(name: string, environment: Environment, logDir: string, stream?: Writable): HandlerSpec[] {

    const target = stream ?? 'stdout';
    const file = (suffix: string) => join(logDir, `${name}${suffix}.log`);

    switch (environment) {

    case 'development':
        return [
            { kind: 'stream', stream: target, formatter: 'console', colors: 'auto' },
        ];

    case 'testing':
        return [
            { kind: 'stream', stream: target, formatter: 'console', colors: 'off' },
        ];

    case 'staging':
        return [
            { kind: 'stream', stream: target, formatter: 'json' },
            { kind: 'rotating-file', path: file(''), formatter: 'json', maxSize: '10mb', backupCount: 5 },
        ];

    case 'production':
        return [
            { kind: 'stream', stream: target, formatter: 'json' },
            { kind: 'daily-file', path: file(''), formatter: 'json', backupCount: 30 },
            {
                kind: 'rotating-file',
                path: file('.error'),
                formatter: 'json',
                level: 'ERROR',
                maxSize: '10mb',
                backupCount: 10,
            },
        ];

    }

}

/**
 * Build the config for a named logger under an environment preset.
 *
 * @example
 * ```typescript
 * const config = createPresetConfig('api', 'staging', { logDir: '/var/log/api' })
 * // config.level === 'INFO'
 * // config.handlers[1].path === '/var/log/api/api.log'
 * ```
 */
export function createPresetConfig(
    name: string,
    environment: Environment,
    options: PresetOptions = {},
    env: NodeJS.ProcessEnv = process.env,
): LoggerConfig {

    const parsed = parseLogEnv(env);
    const logDir = options.logDir ?? parsed.LOG_DIR ?? DEFAULT_LOG_DIR;

    return Object.freeze({
        name,
        environment,
        level: options.level ?? parsed.LOG_LEVEL ?? PRESET_LEVELS[environment],
        handlers: Object.freeze(presetHandlers(name, environment, logDir, options.stream)),
        filters: Object.freeze([new SensitiveDataFilter()]),
    });

}

/**
 * Build the config for the environment named by `ENVIRONMENT`.
 */
export function configFromEnvironment(
    name: string,
    options: PresetOptions = {},
    env: NodeJS.ProcessEnv = process.env,
): LoggerConfig {

    return createPresetConfig(name, resolveEnvironment(env), options, env);

}
