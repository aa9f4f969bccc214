/**
 * Logger errors.
 *
 * Only configuration problems surface as exceptions. Everything that
 * happens while a record is being logged is recovered locally.
 */
import type { ZodIssue } from 'zod'


/**
 * Error when a logger cannot be built from its configuration.
 *
 * Thrown by `new Logger()` and `getLogger()` for an unknown environment,
 * an invalid level or handler spec, or a log path that cannot be opened.
 *
 * @example
 * ```typescript
 * const [logger, err] = attemptSync(() => getLogger('api'))
 * if (err instanceof LoggerConfigurationError) {
 *     console.error(`Logging misconfigured: ${err.message}`)
 * }
 * ```
 */
export class LoggerConfigurationError extends Error {

    override readonly name = 'LoggerConfigurationError' as const

    constructor(
        message: string,
        public readonly issues: ZodIssue[] = [],
        options?: { cause?: unknown },
    ) {

        super(message, options)
    }
}


/**
 * Error when a handler cannot open its sink.
 */
export class HandlerError extends Error {

    override readonly name = 'HandlerError' as const

    constructor(
        public readonly handler: string,
        public readonly path: string,
        reason: string,
    ) {

        super(`Handler '${handler}' cannot write to ${path}: ${reason}`)
    }
}
