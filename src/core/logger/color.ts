/**
 * Console Line Rendering
 *
 * Builds the human-readable line: `[time] LEVEL    logger: message | k=v k=v`.
 * Fields are flattened one level deep; nested objects are stringified.
 * Colors come from the centralized theme and are optional.
 */
import { attemptSync } from '@logosdx/utils';

import { levelColors, theme } from '../theme.js';
import type { CapturedError, LogLevel, LogRecord } from './types.js';

/**
 * Paint functions used by the line renderer.
 */
export interface Paint {
    level: (level: LogLevel, text: string) => string;
    key: (text: string) => string;
    value: (text: string) => string;
    number: (text: string) => string;
    error: (text: string) => string;
}

const identity = (text: string) => text;

export const PLAIN: Paint = {
    level: (_level, text) => text,
    key: identity,
    value: identity,
    number: identity,
    error: identity,
};

export const COLORED: Paint = {
    level: (level, text) => levelColors[level](text),
    key: theme.muted,
    value: theme.text,
    number: theme.number,
    error: theme.error,
};

// Wide enough for CRITICAL
const LEVEL_WIDTH = 8;

/**
 * Format a value for single-line display.
 *
 * Primitives are displayed directly, objects are stringified and
 * truncated.
 */
export function formatValue(value: unknown, paint: Paint = PLAIN): string {

    if (value === null) {

        return paint.value('null');

    }

    if (value === undefined) {

        return paint.value('undefined');

    }

    if (typeof value === 'string') {

        return value.length > 50
            ? paint.value(`"${value.slice(0, 47)}..."`)
            : paint.value(value);

    }

    if (typeof value === 'number' || typeof value === 'bigint') {

        return paint.number(String(value));

    }

    if (typeof value === 'boolean') {

        return paint.number(String(value));

    }

    if (value instanceof Date) {

        const [iso] = attemptSync(() => value.toISOString());

        return paint.value(iso ?? 'Invalid Date');

    }

    if (value instanceof Error) {

        return paint.error(value.message);

    }

    if (Array.isArray(value)) {

        if (value.length === 0) {

            return paint.value('[]');

        }

        if (value.length <= 3 && value.every((v) => typeof v === 'string' || typeof v === 'number')) {

            return paint.value(`[${value.join(', ')}]`);

        }

        return paint.value(`[${value.length} items]`);

    }

    if (typeof value === 'object') {

        const [str, error] = attemptSync(() => JSON.stringify(value));

        if (error || typeof str !== 'string') {

            return paint.value('[object]');

        }

        return paint.value(str.length > 60 ? str.slice(0, 57) + '...' : str);

    }

    return paint.value(String(value));

}

/**
 * Flatten fields to space-joined key=value pairs.
 */
export function flattenFields(fields: Readonly<Record<string, unknown>>, paint: Paint = PLAIN): string {

    const pairs: string[] = [];

    for (const [key, value] of Object.entries(fields)) {

        pairs.push(`${paint.key(key)}=${formatValue(value, paint)}`);

    }

    return pairs.join(' ');

}

/**
 * Render a captured error as a multi-line block (leading newline included).
 */
export function formatErrorBlock(error: Readonly<CapturedError>, paint: Paint = PLAIN): string {

    let block = `\n${paint.error(`${error.type}: ${error.message}`)}`;

    for (const frame of error.frames) {

        block += `\n    ${frame}`;

    }

    return block;

}

/**
 * Format a record as a single console line (plus error block).
 *
 * @example
 * ```typescript
 * formatConsoleLine(record)
 * // '[2024-01-15T10:30:00.000Z] WARNING  svc: disk low | request_id=r1 free_mb=12'
 * ```
 */
export function formatConsoleLine(record: LogRecord, paint: Paint = PLAIN): string {

    const label = paint.level(record.level, record.level.padEnd(LEVEL_WIDTH));

    let line = `[${record.timestamp.toISOString()}] ${label} ${record.logger}: ${record.message}`;

    // Context pairs first, then extra; a key present in both shows twice
    const pairs = [record.context, record.extra]
        .filter((fields) => Object.keys(fields).length > 0)
        .map((fields) => flattenFields(fields, paint));

    if (pairs.length > 0) {

        line += ` | ${pairs.join(' ')}`;

    }

    if (record.error) {

        line += formatErrorBlock(record.error, paint);

    }

    return line;

}
