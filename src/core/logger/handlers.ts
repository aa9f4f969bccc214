/**
 * Log Handlers
 *
 * A handler owns a sink, a formatter and a level threshold. Records
 * below the threshold are dropped; everything else is rendered and
 * written. A failing sink never throws at the caller: the record is
 * dropped and `handler:error` is emitted on the observer.
 *
 * @example
 * ```typescript
 * const handler = new RotatingFileHandler('/var/log/api.log', {
 *     maxBytes: parseSize('10mb'),
 *     backupCount: 5,
 *     formatter: new JsonFormatter(),
 * })
 *
 * handler.handle(record)
 * handler.close()
 * ```
 */
import { closeSync, fstatSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';

import { attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import { HandlerError } from './errors.js';
import { isLevelEnabled } from './filters.js';
import { ConsoleFormatter, createFormatter, shouldColor } from './formatter.js';
import {
    nextLocalMidnight,
    needsSizeRotation,
    parseSize,
    rotateDated,
    rotateIndexed,
} from './rotation.js';
import type { HandlerSpec, LogFormatter, LogHandler, LogLevel, LogRecord, RotationResult } from './types.js';

/**
 * Options shared by all handlers.
 */
export interface HandlerOptions {

    /** Threshold; defaults to DEBUG so the logger level decides */
    level?: LogLevel;

    /** Defaults to a plain ConsoleFormatter */
    formatter?: LogFormatter;
}

/**
 * Level gate, render and error containment around a sink write.
 */
export abstract class BaseHandler implements LogHandler {

    readonly name: string;
    readonly level: LogLevel;
    readonly formatter: LogFormatter;

    constructor(name: string, options: HandlerOptions = {}) {

        this.name = name;
        this.level = options.level ?? 'DEBUG';
        this.formatter = options.formatter ?? new ConsoleFormatter();

    }

    handle(record: LogRecord): void {

        if (!isLevelEnabled(record.level, this.level)) {

            return;

        }

        const [, err] = attemptSync(() => this.write(this.formatter.render(record), record));

        if (err) {

            this.reportError(err);

        }

    }

    close(): void {

        // Nothing to release by default

    }

    /**
     * Write one rendered record to the sink. May throw.
     */
    protected abstract write(line: string, record: LogRecord): void;

    protected reportError(error: Error): void {

        const [, emitErr] = attemptSync(() => observer.emit('handler:error', { handler: this.name, error }));

        if (emitErr) {

            process.stderr.write(`log handler ${this.name} failed: ${error.message}\n`);

        }

    }

    protected reportRotation(file: string, result: RotationResult): void {

        if (!result.rotated || !result.backup) {

            return;

        }

        const payload = {
            handler: this.name,
            file,
            backup: result.backup,
            deletedFiles: result.deletedFiles ?? [],
        };

        attemptSync(() => observer.emit('handler:rotated', payload));

    }

}

// ─────────────────────────────────────────────────────────────
// Stream
// ─────────────────────────────────────────────────────────────

/**
 * Writes each line to a fixed stream. No rotation.
 */
export class StreamHandler extends BaseHandler {

    readonly stream: Writable;
    readonly #onError = (error: Error) => this.reportError(error);

    constructor(stream: Writable = process.stdout, options: HandlerOptions & { name?: string } = {}) {

        super(options.name ?? streamName(stream), options);

        this.stream = stream;

        // Async stream failures (EPIPE, destroyed stream) arrive as events.
        // Process streams are shared by every logger; leave them alone.
        if (!isProcessStream(stream)) {

            this.stream.on('error', this.#onError);

        }

    }

    protected override write(line: string): void {

        this.stream.write(line + '\n');

    }

    override close(): void {

        this.stream.off('error', this.#onError);

    }

}

// ─────────────────────────────────────────────────────────────
// Files
// ─────────────────────────────────────────────────────────────

/**
 * Open a log file for appending, creating its directory.
 *
 * @throws HandlerError when the directory or file cannot be opened
 */
function openLogFile(handler: string, filepath: string, flags: 'a' | 'w' = 'a'): number {

    const [, mkdirErr] = attemptSync(() => mkdirSync(dirname(filepath), { recursive: true }));

    if (mkdirErr) {

        throw new HandlerError(handler, filepath, mkdirErr.message);

    }

    const [fd, openErr] = attemptSync(() => openSync(filepath, flags));

    if (openErr) {

        throw new HandlerError(handler, filepath, openErr.message);

    }

    return fd;

}

/**
 * Shared file descriptor handling for the file handlers.
 */
abstract class FileHandler extends BaseHandler {

    readonly filepath: string;
    protected fd: number | null;

    constructor(name: string, filepath: string, options: HandlerOptions) {

        super(name, options);

        this.filepath = filepath;
        this.fd = openLogFile(name, filepath);

    }

    /**
     * Size of the open file in bytes.
     */
    protected currentSize(): number {

        if (this.fd === null) {

            return 0;

        }

        return fstatSync(this.fd).size;

    }

    protected append(data: string): void {

        if (this.fd === null) {

            throw new HandlerError(this.name, this.filepath, 'file is closed');

        }

        writeSync(this.fd, data);

    }

    /**
     * Close the active file, run `rotate`, reopen a fresh file.
     *
     * The file is reopened even when `rotate` fails, so logging goes on
     * into the old file.
     */
    protected reopenAround(rotate: () => RotationResult, flags: 'a' | 'w' = 'a'): void {

        this.closeFd();

        try {

            const result = rotate();
            this.fd = openLogFile(this.name, this.filepath, flags);
            this.reportRotation(this.filepath, result);

        }
        finally {

            if (this.fd === null) {

                this.fd = openLogFile(this.name, this.filepath, 'a');

            }

        }

    }

    override close(): void {

        this.closeFd();

    }

    private closeFd(): void {

        if (this.fd === null) {

            return;

        }

        const fd = this.fd;
        this.fd = null;

        const [, err] = attemptSync(() => closeSync(fd));

        if (err) {

            this.reportError(err);

        }

    }

}

/**
 * Options for RotatingFileHandler.
 */
export interface RotatingFileOptions extends HandlerOptions {

    /** Rotate once the file would grow beyond this many bytes; 0 disables */
    maxBytes: number;

    /** Numbered backups to keep; 0 truncates instead of keeping one */
    backupCount: number;
}

/**
 * Appends to a file and rotates it by size into `file.1 … file.N`.
 */
export class RotatingFileHandler extends FileHandler {

    readonly maxBytes: number;
    readonly backupCount: number;
    #size: number;

    constructor(filepath: string, options: RotatingFileOptions) {

        super(`rotating-file:${filepath}`, filepath, options);

        this.maxBytes = options.maxBytes;
        this.backupCount = Math.max(0, Math.floor(options.backupCount));
        this.#size = this.currentSize();

    }

    protected override write(line: string): void {

        const data = line + '\n';
        const bytes = Buffer.byteLength(data, 'utf8');

        if (needsSizeRotation(this.#size, bytes, this.maxBytes)) {

            const [, err] = attemptSync(() => this.#rotate());

            if (err) {

                this.reportError(err);

            }

        }

        this.append(data);
        this.#size += bytes;

    }

    #rotate(): void {

        if (this.backupCount === 0) {

            this.reopenAround(() => ({ rotated: false }), 'w');

        }
        else {

            this.reopenAround(() => rotateIndexed(this.filepath, this.backupCount));

        }

        this.#size = this.currentSize();

    }

}

/**
 * Options for DailyRotatingFileHandler.
 */
export interface DailyFileOptions extends HandlerOptions {

    /** Dated backups to keep */
    backupCount: number;

    /** Clock; defaults to the system clock */
    now?: () => Date;
}

/**
 * Appends to a file and rotates it at local midnight into
 * `file.YYYY-MM-DD`, regardless of size.
 */
export class DailyRotatingFileHandler extends FileHandler {

    readonly backupCount: number;
    readonly #now: () => Date;
    #periodStart: Date;
    #rolloverAt: number;

    constructor(filepath: string, options: DailyFileOptions) {

        super(`daily-file:${filepath}`, filepath, options);

        this.backupCount = Math.max(0, Math.floor(options.backupCount));
        this.#now = options.now ?? (() => new Date());

        // A non-empty file left over from an earlier day rolls on first write
        const now = this.#now();
        const [stats] = attemptSync(() => (this.fd === null ? null : fstatSync(this.fd)));
        const modified = stats && stats.size > 0 ? stats.mtime : now;

        this.#periodStart = modified.getTime() < now.getTime() ? modified : now;
        this.#rolloverAt = nextLocalMidnight(this.#periodStart).getTime();

    }

    /**
     * Epoch millis of the next scheduled rotation.
     */
    get rolloverAt(): number {

        return this.#rolloverAt;

    }

    protected override write(line: string): void {

        const now = this.#now();

        if (now.getTime() >= this.#rolloverAt) {

            const periodStart = this.#periodStart;

            this.#periodStart = now;
            this.#rolloverAt = nextLocalMidnight(now).getTime();

            const [, err] = attemptSync(() => this.reopenAround(
                () => rotateDated(this.filepath, periodStart, this.backupCount),
            ));

            if (err) {

                this.reportError(err);

            }

        }

        this.append(line + '\n');

    }

}

// ─────────────────────────────────────────────────────────────
// Memory
// ─────────────────────────────────────────────────────────────

/**
 * Keeps rendered lines and records in memory.
 */
export class MemoryHandler extends BaseHandler {

    readonly lines: string[] = [];
    readonly records: LogRecord[] = [];

    constructor(options: HandlerOptions & { name?: string } = {}) {

        super(options.name ?? 'memory', options);

    }

    protected override write(line: string, record: LogRecord): void {

        this.lines.push(line);
        this.records.push(record);

    }

    clear(): void {

        this.lines.length = 0;
        this.records.length = 0;

    }

}

// ─────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────

/**
 * Build a handler from its spec.
 *
 * @throws HandlerError when a file sink cannot be opened
 * @throws Error on an invalid size string
 */
export function createHandler(spec: HandlerSpec): LogHandler {

    switch (spec.kind) {

    case 'custom':
        return spec.handler;

    case 'stream': {

        const stream = resolveStream(spec.stream);
        const colors = shouldColor(spec.colors ?? 'auto', stream);

        return new StreamHandler(stream, {
            level: spec.level,
            formatter: createFormatter(spec.formatter, colors),
        });

    }

    case 'rotating-file':
        return new RotatingFileHandler(spec.path, {
            level: spec.level,
            formatter: createFormatter(spec.formatter),
            maxBytes: parseSize(spec.maxSize),
            backupCount: spec.backupCount,
        });

    case 'daily-file':
        return new DailyRotatingFileHandler(spec.path, {
            level: spec.level,
            formatter: createFormatter(spec.formatter),
            backupCount: spec.backupCount,
        });

    }

}

function resolveStream(stream: 'stdout' | 'stderr' | Writable | undefined): Writable {

    if (stream === undefined || stream === 'stdout') return process.stdout;
    if (stream === 'stderr') return process.stderr;

    return stream;

}

function isProcessStream(stream: Writable): boolean {

    return stream === process.stdout || stream === process.stderr;

}

function streamName(stream: Writable): string {

    if (stream === process.stdout) return 'stream:stdout';
    if (stream === process.stderr) return 'stream:stderr';

    return 'stream';

}
