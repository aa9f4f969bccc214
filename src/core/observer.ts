/**
 * Logger diagnostics bus.
 *
 * The pipeline never throws at its callers, so its own failures and
 * lifecycle changes are published here instead. Applications subscribe
 * to surface them (metrics, a fallback sink, a test assertion).
 *
 * @example
 * ```typescript
 * const cleanup = observer.on('handler:error', ({ handler, error }) => {
 *     process.stderr.write(`log sink ${handler} failed: ${error.message}\n`)
 * })
 *
 * // Later
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'


/**
 * All events emitted by the logging pipeline.
 *
 * - `logger:*` - Logger construction and dispatch failures
 * - `handler:*` - Sink failures and file rotation
 */
export interface LoggerEvents {

    // Logger
    'logger:created': { name: string; environment: string; level: string }
    'logger:error': { name: string; error: Error }

    // Handlers
    'handler:error': { handler: string; error: Error }
    'handler:rotated': { handler: string; file: string; backup: string; deletedFiles: string[] }
}

export type LoggerEventNames = Events<LoggerEvents>


/**
 * Global observer instance.
 *
 * Set `LOG_DEBUG=1` to trace every event to stderr.
 */
export const observer = new ObserverEngine<LoggerEvents>({
    spy: isDebug()
        ? (action) => console.error(`[logger:${action.fn}] ${String(action.event)}`)
        : undefined
})
