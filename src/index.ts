/**
 * logline: structured logging pipeline.
 *
 * @example
 * ```typescript
 * import { getLogger, withContext } from 'logline'
 *
 * const logger = getLogger('api.orders')
 *
 * withContext({ requestId: 'r-1' }, () => {
 *     logger.info('Order placed', { orderId: 7 })
 * })
 * ```
 */
export * from './core/logger/index.js';
export { observer, type LoggerEvents, type LoggerEventNames } from './core/observer.js';
