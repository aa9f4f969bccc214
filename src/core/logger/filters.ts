/**
 * Filter Pipeline
 *
 * Ordered stages that either veto a record or return a sanitized copy.
 * New stages are added by implementing LogFilter and listing them in
 * the logger config; the logger itself never changes.
 *
 * @example
 * ```typescript
 * const filters = [new LevelFilter('INFO'), new SensitiveDataFilter(['iban'])]
 * const record = runFilters(filters, createRecord({ ... }))
 * if (record) handler.handle(record)
 * ```
 */
import { makeKeyMatcher, redactFields } from './redact.js';
import type { FilterResult, LogFilter, LogLevel, LogRecord } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Check whether `level` is at or above `minimum`.
 */
export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {

    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minimum];

}

/**
 * Vetoes records below a minimum level.
 */
export class LevelFilter implements LogFilter {

    readonly name: string;

    constructor(readonly minimum: LogLevel) {

        this.name = `level:${minimum}`;

    }

    apply(record: LogRecord): FilterResult {

        return isLevelEnabled(record.level, this.minimum)
            ? { keep: true, record }
            : { keep: false };

    }

}

/**
 * Replaces the values of sensitive context and extra keys with the
 * redaction sentinel.
 *
 * Uses the process-wide blocklist (see addSensitiveKeys) plus any
 * keys given to this instance.
 */
export class SensitiveDataFilter implements LogFilter {

    readonly name: string;
    readonly #matches: (key: string) => boolean;

    constructor(extraKeys: readonly string[] = []) {

        this.name = extraKeys.length > 0
            ? `sensitive-data:${[...extraKeys].sort().join(',')}`
            : 'sensitive-data';

        this.#matches = makeKeyMatcher(extraKeys);

    }

    apply(record: LogRecord): FilterResult {

        return {
            keep: true,
            record: Object.freeze({
                ...record,
                context: Object.freeze(redactFields(record.context, this.#matches)),
                extra: Object.freeze(redactFields(record.extra, this.#matches)),
            }),
        };

    }

}

/**
 * Run filters in order.
 *
 * @returns The final record, or null when a stage vetoed it
 */
export function runFilters(filters: readonly LogFilter[], record: LogRecord): LogRecord | null {

    let current = record;

    for (const filter of filters) {

        const result = filter.apply(current);

        if (!result.keep) {

            return null;

        }

        current = result.record;

    }

    return current;

}
