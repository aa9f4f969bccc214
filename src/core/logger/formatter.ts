/**
 * Log Formatters
 *
 * Turn a filtered record into one output string. The JSON formatter
 * writes one self-describing object per line; the console formatter
 * writes a human-readable line.
 */
import type { Writable } from 'node:stream'

import { attemptSync } from '@logosdx/utils'

import { isCi } from '../environment.js'
import { COLORED, PLAIN, formatConsoleLine } from './color.js'
import type { ColorMode, FormatterSpec, LogFormatter, LogRecord } from './types.js'


/**
 * Shape of a JSON log line.
 */
export interface JsonLogLine {
    timestamp: string
    level: string
    logger: string
    message: string
    module: string
    function: string
    line: number
    context: Record<string, unknown>
    extra: Record<string, unknown>
    error?: { type: string; message: string; frames: string[] }
}


/**
 * Convert a record into the JSON line object.
 *
 * @example
 * ```typescript
 * toJsonLine(record)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'INFO',
 * //     logger: 'api',
 * //     message: 'Order placed',
 * //     module: 'orders',
 * //     function: 'placeOrder',
 * //     line: 42,
 * //     context: { requestId: 'r-1' },
 * //     extra: { orderId: 7 }
 * // }
 * ```
 */
export function toJsonLine(record: LogRecord): JsonLogLine {

    const line: JsonLogLine = {
        timestamp: record.timestamp.toISOString(),
        level: record.level,
        logger: record.logger,
        message: record.message,
        module: record.origin.module,
        function: record.origin.function,
        line: record.origin.line,
        context: { ...record.context },
        extra: { ...record.extra },
    }

    if (record.error) {

        line.error = {
            type: record.error.type,
            message: record.error.message,
            frames: [...record.error.frames],
        }
    }

    return line
}


/**
 * JSON.stringify that tolerates bigint, errors and cycles.
 *
 * Only a reference back to an enclosing object counts as a cycle; an
 * object that appears twice side by side is written both times.
 */
export function safeStringify(value: unknown): string {

    // Objects on the path from the root to the value being written
    const ancestors: object[] = []

    const [json, err] = attemptSync(() => JSON.stringify(value, function (this: unknown, _key: string, v: unknown) {

        let out: unknown = v

        if (typeof v === 'bigint') out = v.toString()

        if (v instanceof Error) out = { name: v.name, message: v.message }

        if (out === null || typeof out !== 'object') return out

        // `this` is the object holding the current key
        while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {

            ancestors.pop()
        }

        if (ancestors.includes(out)) return '[Circular]'

        ancestors.push(out)

        return out
    }))

    if (err || typeof json !== 'string') {

        return '"[Unserializable]"'
    }

    return json
}


/**
 * One JSON object per line.
 */
export class JsonFormatter implements LogFormatter {

    readonly name = 'json'

    render(record: LogRecord): string {

        return safeStringify(toJsonLine(record))
    }
}


/**
 * Human-readable single line, optionally colored by level.
 */
export class ConsoleFormatter implements LogFormatter {

    readonly name: string
    readonly colors: boolean

    constructor(options: { colors?: boolean } = {}) {

        this.colors = options.colors ?? false
        this.name = this.colors ? 'console:color' : 'console'
    }

    render(record: LogRecord): string {

        return formatConsoleLine(record, this.colors ? COLORED : PLAIN)
    }
}


/**
 * Decide whether to color output for a stream.
 *
 * `auto` colors only interactive terminals outside CI.
 */
export function shouldColor(mode: ColorMode, stream?: Writable): boolean {

    if (mode === 'on') return true
    if (mode === 'off') return false

    const isTTY = stream !== undefined && 'isTTY' in stream && stream.isTTY === true

    return isTTY && !isCi()
}


/**
 * Resolve a formatter spec to an instance.
 */
export function createFormatter(spec: FormatterSpec, colors = false): LogFormatter {

    if (spec === 'json') return new JsonFormatter()
    if (spec === 'console') return new ConsoleFormatter({ colors })

    return spec
}
