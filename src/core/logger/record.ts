/**
 * Record Construction
 *
 * Builds frozen LogRecord snapshots. Construction never throws:
 * reserved or unloggable fields are dropped, an unreadable call site
 * becomes `<unknown>`.
 */
import { basename, dirname, extname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { attemptSync } from '@logosdx/utils';

import type { CapturedError, LogLevel, LogRecord, RecordOrigin } from './types.js';

/**
 * Attribute names owned by the record or by the log record model the
 * pipeline mirrors. Caller fields with these names are dropped.
 */
export const RESERVED_ATTRIBUTES: ReadonlySet<string> = new Set([

    // Record fields
    'timestamp',
    'level',
    'logger',
    'message',
    'module',
    'function',
    'line',
    'origin',
    'context',
    'extra',
    'error',

    // Classic log record attributes
    'name',
    'msg',
    'args',
    'created',
    'filename',
    'funcName',
    'levelname',
    'levelno',
    'lineno',
    'msecs',
    'pathname',
    'process',
    'processName',
    'relativeCreated',
    'thread',
    'threadName',
    'exc_info',
    'exc_text',
    'stack_info',
    'taskName',
]);

const UNKNOWN_ORIGIN: RecordOrigin = Object.freeze({
    module: '<unknown>',
    function: '<unknown>',
    line: 0,
});

// Frames from files in this directory belong to the logger itself
const LOGGER_DIR = dirname(fileURLToPath(import.meta.url));

const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Input for createRecord.
 */
export interface RecordInput {
    level: LogLevel;
    logger: string;
    message: string;
    context?: Record<string, unknown>;
    extra?: Record<string, unknown>;
    error?: CapturedError;

    /** Call site; resolved from the stack when omitted */
    origin?: RecordOrigin;
}

/**
 * Check whether a field name is reserved by the record.
 */
export function isReservedAttribute(key: string): boolean {

    return RESERVED_ATTRIBUTES.has(key);

}

/**
 * Copy fields, dropping reserved names and values that cannot be logged.
 *
 * @example
 * ```typescript
 * sanitizeFields({ level: 'x', orderId: 7, cb: () => {} })
 * // => { orderId: 7 }
 * ```
 */
export function sanitizeFields(fields?: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {};

    if (!fields) {

        return result;

    }

    const [entries, err] = attemptSync(() => Object.entries(fields));

    if (err) {

        return result;

    }

    for (const [key, value] of entries) {

        if (RESERVED_ATTRIBUTES.has(key)) {

            continue;

        }

        if (typeof value === 'function' || typeof value === 'symbol') {

            continue;

        }

        result[key] = value;

    }

    return result;

}

/**
 * Parse `at ...` lines out of a stack string.
 */
export function parseStackFrames(stack: string | undefined): string[] {

    if (!stack) {

        return [];

    }

    return stack
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.startsWith('at '));

}

/**
 * Capture a thrown value as record data.
 *
 * @example
 * ```typescript
 * captureError(new TypeError('bad input'))
 * // => { type: 'TypeError', message: 'bad input', frames: ['at parse (...)', ...] }
 *
 * captureError('boom')
 * // => { type: 'string', message: 'boom', frames: [] }
 * ```
 */
export function captureError(value: unknown): CapturedError {

    if (value instanceof Error) {

        return {
            type: value.name || value.constructor.name,
            message: value.message,
            frames: parseStackFrames(value.stack),
        };

    }

    const type = value === null ? 'null' : typeof value;

    if (typeof value === 'string') {

        return { type, message: value, frames: [] };

    }

    const [json] = attemptSync(() => JSON.stringify(value));

    if (typeof json === 'string') {

        return { type, message: json, frames: [] };

    }

    const [str] = attemptSync(() => String(value));

    return { type, message: str ?? '[unprintable]', frames: [] };

}

/**
 * Resolve the first stack frame outside the logger package.
 */
export function captureOrigin(): RecordOrigin {

    // Not wrapped: every frame past the logger's own is the caller's
    const { stack } = new Error();

    if (!stack) {

        return UNKNOWN_ORIGIN;

    }

    for (const line of stack.split('\n')) {

        const match = FRAME_PATTERN.exec(line);

        if (!match || !match[2] || !match[3]) {

            continue;

        }

        const file = toFilePath(match[2]);

        if (file.startsWith('node:') || dirname(file) === LOGGER_DIR) {

            continue;

        }

        const fn = (match[1] ?? '<anonymous>').replace(/^(async|new) /, '');

        return {
            module: basename(file, extname(file)),
            function: fn,
            line: Number(match[3]),
        };

    }

    return UNKNOWN_ORIGIN;

}

/**
 * Build a frozen record.
 *
 * Context and extra are copied through sanitizeFields, so a caller
 * using a reserved key still gets a record, minus that key.
 */
export function createRecord(input: RecordInput): LogRecord {

    const record: LogRecord = {
        timestamp: new Date(),
        level: input.level,
        logger: input.logger,
        message: String(input.message),
        origin: input.origin ?? captureOrigin(),
        context: Object.freeze(sanitizeFields(input.context)),
        extra: Object.freeze(sanitizeFields(input.extra)),
        ...(input.error ? { error: Object.freeze(input.error) } : {}),
    };

    return Object.freeze(record);

}

/**
 * Strip the file:// scheme from a stack frame location.
 */
function toFilePath(location: string): string {

    if (!location.startsWith('file://')) {

        return location;

    }

    const [path] = attemptSync(() => fileURLToPath(location));

    return path ?? location;

}
