import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ContextStore } from '../../../src/core/logger/context.js';
import { LoggerConfigurationError } from '../../../src/core/logger/errors.js';
import { SensitiveDataFilter } from '../../../src/core/logger/filters.js';
import { JsonFormatter } from '../../../src/core/logger/formatter.js';
import { MemoryHandler } from '../../../src/core/logger/handlers.js';
import { Logger } from '../../../src/core/logger/logger.js';
import { validateLoggerConfig } from '../../../src/core/logger/schema.js';
import type { LogFilter, LogHandler, LogLevel } from '../../../src/core/logger/types.js';

class PaymentError extends Error {

    override name = 'PaymentError';

}

function createLogger(level: LogLevel = 'DEBUG', filters: LogFilter[] = [], handlers: LogHandler[] = []) {

    const memory = new MemoryHandler({ formatter: new JsonFormatter() });
    const store = new ContextStore();

    const logger = new Logger({
        name: 'svc',
        environment: 'testing',
        level,
        handlers: [...handlers, memory].map((handler) => ({ kind: 'custom' as const, handler })),
        filters,
    }, { contextStore: store });

    return { logger, memory, store };

}

describe('logger: Logger class', () => {

    beforeEach(() => {

        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2024-01-15T10:30:00.000Z'));

    });

    afterEach(() => {

        vi.useRealTimers();

    });

    describe('construction', () => {

        it('should expose its config', () => {

            const { logger } = createLogger('INFO');

            expect(logger.name).toBe('svc');
            expect(logger.level).toBe('INFO');
            expect(logger.environment).toBe('testing');
            expect(logger.handlers).toHaveLength(1);
            expect(logger.closed).toBe(false);

        });

        it('should reject an invalid config', () => {

            const config: unknown = { name: '', environment: 'testing', level: 'INFO', handlers: [], filters: [] };

            expect(() => validateLoggerConfig(config)).toThrow(LoggerConfigurationError);
            expect(() => validateLoggerConfig(config)).toThrow('Invalid logger config (name): Logger name is required');

        });

        it('should reject an unknown level', () => {

            const config: unknown = { name: 'svc', environment: 'testing', level: 'LOUD', handlers: [], filters: [] };

            expect(() => validateLoggerConfig(config)).toThrow(/^Invalid logger config \(level\)/);

        });

        it('should reject a bad rotation size', () => {

            const config: unknown = {
                name: 'svc',
                environment: 'testing',
                level: 'INFO',
                handlers: [{ kind: 'rotating-file', formatter: 'json', path: 'app.log', maxSize: 'huge', backupCount: 1 }],
                filters: [],
            };

            expect(() => validateLoggerConfig(config)).toThrow('Invalid logger config (handlers.0.maxSize): Invalid size format: huge');

        });

        describe('with an unwritable file sink', () => {

            let testDir: string;

            beforeEach(async () => {

                testDir = join(tmpdir(), `logline-test-logger-${Date.now()}-${Math.random().toString(36).slice(2)}`);
                await mkdir(testDir, { recursive: true });

            });

            afterEach(async () => {

                await rm(testDir, { recursive: true, force: true });

            });

            it('should throw LoggerConfigurationError', async () => {

                const blocker = join(testDir, 'blocker');
                await writeFile(blocker, 'not a directory');

                expect(() => new Logger({
                    name: 'svc',
                    environment: 'staging',
                    level: 'INFO',
                    handlers: [{ kind: 'rotating-file', formatter: 'json', path: join(blocker, 'app.log'), maxSize: '1mb', backupCount: 1 }],
                    filters: [],
                })).toThrow(LoggerConfigurationError);

            });

        });

    });

    describe('levels', () => {

        it('should log through each level method', () => {

            const { logger, memory } = createLogger();

            logger.debug('d');
            logger.info('i');
            logger.warning('w');
            logger.error('e');
            logger.critical('c');
            logger.log('INFO', 'l');

            expect(memory.records.map((r) => `${r.level}:${r.message}`)).toEqual([
                'DEBUG:d',
                'INFO:i',
                'WARNING:w',
                'ERROR:e',
                'CRITICAL:c',
                'INFO:l',
            ]);

        });

        it('should drop records below the logger level', () => {

            const { logger, memory } = createLogger('WARNING');

            logger.debug('d');
            logger.info('i');
            logger.warning('w');

            expect(memory.records.map((r) => r.message)).toEqual(['w']);
            expect(logger.isEnabledFor('INFO')).toBe(false);
            expect(logger.isEnabledFor('ERROR')).toBe(true);

        });

        it('should let a handler be stricter than the logger', () => {

            const strict = new MemoryHandler({ level: 'ERROR' });
            const { logger, memory } = createLogger('DEBUG', [], [strict]);

            logger.info('i');
            logger.error('e');

            expect(memory.records.map((r) => r.message)).toEqual(['i', 'e']);
            expect(strict.records.map((r) => r.message)).toEqual(['e']);

        });

    });

    describe('records', () => {

        it('should write the JSON line', () => {

            const { logger, memory } = createLogger();

            logger.info('Order placed', { orderId: 7 });

            expect(memory.lines).toHaveLength(1);
            expect(JSON.parse(memory.lines[0] ?? '')).toMatchObject({
                timestamp: '2024-01-15T10:30:00.000Z',
                level: 'INFO',
                logger: 'svc',
                message: 'Order placed',
                module: 'logger.test',
                context: {},
                extra: { orderId: 7 },
            });

        });

        it('should drop reserved keys and keep the rest', () => {

            const { logger, memory } = createLogger();

            logger.info('kept', { message: 'override', level: 'bad', orderId: 1 });

            expect(memory.records[0]?.message).toBe('kept');
            expect(memory.records[0]?.level).toBe('INFO');
            expect(memory.records[0]?.extra).toEqual({ orderId: 1 });

        });

        it('should redact sensitive fields without configuration', () => {

            const { logger, memory } = createLogger();

            logger.info('login', { password: 'abc123', user: 'ada' });

            expect(memory.records[0]?.extra).toEqual({ password: '[REDACTED]', user: 'ada' });
            expect(memory.lines[0]?.includes('abc123')).toBe(false);

        });

        it('should redact every reference to a shared object in the JSON line', () => {

            const { logger, memory } = createLogger();
            const creds = { password: 'hunter2' };

            logger.info('x', { primary: creds, fallback: creds });

            expect(JSON.parse(memory.lines[0] ?? '')).toMatchObject({
                extra: {
                    primary: { password: '[REDACTED]' },
                    fallback: { password: '[REDACTED]' },
                },
            });
            expect(memory.lines[0]?.includes('hunter2')).toBe(false);

        });

        it('should apply configured filters after the level gate', () => {

            const seen: string[] = [];
            const spy: LogFilter = {
                name: 'spy',
                apply: (record) => {

                    seen.push(record.message);
                    return { keep: true, record };

                },
            };

            const { logger } = createLogger('INFO', [spy, new SensitiveDataFilter(['iban'])]);

            logger.debug('hidden');
            logger.info('shown', { iban: 'DE00' });

            expect(seen).toEqual(['shown']);

        });

        it('should merge the active context', () => {

            const { logger, memory, store } = createLogger();

            store.run({ request_id: 'r1' }, () => {

                store.run({ request_id: 'r2' }, () => {

                    logger.info('inner');

                });

                logger.info('outer');

            });

            logger.info('none');

            expect(memory.records.map((r) => r.context)).toEqual([
                { request_id: 'r2' },
                { request_id: 'r1' },
                {},
            ]);

        });

    });

    describe('errors', () => {

        it('should capture the error passed to exception()', () => {

            const { logger, memory } = createLogger();

            logger.exception('charge failed', new PaymentError('declined'), { orderId: 7 });

            const record = memory.records[0];

            expect(record?.level).toBe('ERROR');
            expect(record?.extra).toEqual({ orderId: 7 });
            expect(record?.error?.type).toBe('PaymentError');
            expect(record?.error?.message).toBe('declined');
            expect(record?.error?.frames.length).toBeGreaterThan(0);

        });

        it('should capture thrown non-errors', () => {

            const { logger, memory } = createLogger();

            logger.exception('odd throw', 'just a string');

            expect(memory.records[0]?.error).toEqual({ type: 'string', message: 'just a string', frames: [] });

        });

        it('should omit error when none is given', () => {

            const { logger, memory } = createLogger();

            logger.error('plain');

            expect(memory.records[0]?.error).toBeUndefined();

        });

        it('should not throw when a handler throws', () => {

            const broken: LogHandler = {
                name: 'broken',
                level: 'DEBUG',
                handle: () => {

                    throw new Error('sink down');

                },
                close: () => {},
            };

            const { logger, memory } = createLogger('DEBUG', [], [broken]);

            expect(() => logger.info('still delivered')).not.toThrow();
            expect(memory.records.map((r) => r.message)).toEqual(['still delivered']);

        });

        it('should not throw when a filter throws', () => {

            const broken: LogFilter = {
                name: 'broken',
                apply: () => {

                    throw new Error('filter bug');

                },
            };

            const { logger, memory } = createLogger('DEBUG', [broken]);

            expect(() => logger.info('dropped')).not.toThrow();
            expect(memory.records).toEqual([]);

        });

    });

    describe('measureTime', () => {

        it('should log start and completion around a sync function', () => {

            const { logger, memory } = createLogger();

            const result = logger.measureTime('sum', () => 1 + 2, { table: 'users' });

            expect(result).toBe(3);
            expect(memory.records.map((r) => `${r.level}:${r.message}`)).toEqual([
                'DEBUG:Starting sum',
                'INFO:Completed sum',
            ]);
            expect(memory.records[0]?.extra).toEqual({ table: 'users', operation: 'sum' });
            expect(memory.records[1]?.extra['durationMs']).toBeTypeOf('number');
            expect(memory.records[1]?.origin.module).toBe('logger.test');

        });

        it('should log exactly one error and rethrow the original on a sync failure', () => {

            const { logger, memory } = createLogger();
            const failure = new PaymentError('declined');

            let caught: unknown;

            try {

                logger.measureTime('charge', (): number => {

                    throw failure;

                });

            }
            catch (error) {

                caught = error;

            }

            expect(caught).toBe(failure);
            expect(memory.records.map((r) => r.level)).toEqual(['DEBUG', 'ERROR']);

            const failed = memory.records[1];

            expect(failed?.message).toBe('Failed charge');
            expect(failed?.error?.type).toBe('PaymentError');
            expect(failed?.extra['operation']).toBe('charge');

            const duration = failed?.extra['durationMs'];

            expect(typeof duration === 'number' && duration >= 0).toBe(true);

        });

        it('should log completion when a promise resolves', async () => {

            const { logger, memory } = createLogger();

            const value = await logger.measureTime('fetch', async () => 'rows');

            expect(value).toBe('rows');
            expect(memory.records.map((r) => r.message)).toEqual(['Starting fetch', 'Completed fetch']);
            expect(memory.records[1]?.origin.module).toBe('logger.test');

        });

        it('should log exactly one error and reject with the original on a rejection', async () => {

            const { logger, memory } = createLogger();
            const failure = new Error('timeout');

            await expect(logger.measureTime('fetch', async () => {

                throw failure;

            })).rejects.toBe(failure);

            expect(memory.records.map((r) => `${r.level}:${r.message}`)).toEqual([
                'DEBUG:Starting fetch',
                'ERROR:Failed fetch',
            ]);
            expect(memory.records[1]?.error?.message).toBe('timeout');

        });

        it('should keep the context of the calling scope', async () => {

            const { logger, memory, store } = createLogger();

            await store.run({ request_id: 'r1' }, () => logger.measureTime('job', async () => 1));

            expect(memory.records.map((r) => r.context)).toEqual([{ request_id: 'r1' }, { request_id: 'r1' }]);

        });

    });

    describe('close', () => {

        it('should ignore calls after close', () => {

            const { logger, memory } = createLogger();

            logger.close();
            logger.close();
            logger.info('late');

            expect(logger.closed).toBe(true);
            expect(memory.records).toEqual([]);

        });

    });

});
