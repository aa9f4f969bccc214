/**
 * Log Rotation
 *
 * File rotation helpers for the file handlers. Size rotation keeps
 * numbered backups (`app.log.1` is the newest); date rotation keeps
 * backups suffixed with the local date they cover (`app.log.2024-01-15`).
 *
 * Everything here is synchronous: a handler calls it inside the same
 * call that writes the line, so no other write can slip in between the
 * rotation check and the write.
 */
import { existsSync, readdirSync, renameSync, unlinkSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { attemptSync } from '@logosdx/utils'

import type { RotationResult } from './types.js'


/**
 * Parse a size string (e.g., '10mb', '1gb') to bytes.
 *
 * @param size - Size string with unit suffix
 * @returns Size in bytes
 *
 * @example
 * ```typescript
 * parseSize('10mb')  // 10485760
 * parseSize('1gb')   // 1073741824
 * parseSize('512kb') // 524288
 * ```
 */
export function parseSize(size: string): number {

    const match = size.toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/)

    if (!match || !match[1]) {

        throw new Error(`Invalid size format: ${size}`)
    }

    const value = parseFloat(match[1])
    const unit = match[2] ?? 'b'

    const multipliers: Record<string, number> = {
        b: 1,
        kb: 1024,
        mb: 1024 * 1024,
        gb: 1024 * 1024 * 1024,
    }

    const multiplier = multipliers[unit]

    if (multiplier === undefined) {

        throw new Error(`Invalid size unit: ${unit}`)
    }

    return Math.floor(value * multiplier)
}


/**
 * Numbered backup name.
 *
 * @example
 * ```typescript
 * indexedBackupName('/logs/app.log', 2) // '/logs/app.log.2'
 * ```
 */
export function indexedBackupName(filepath: string, index: number): string {

    return `${filepath}.${index}`
}


/**
 * Local calendar date as YYYY-MM-DD.
 */
export function formatLocalDate(date: Date): string {

    const y = date.getFullYear()
    const m = String(date.getMonth() + 1).padStart(2, '0')
    const d = String(date.getDate()).padStart(2, '0')

    return `${y}-${m}-${d}`
}


/**
 * Dated backup name.
 *
 * @example
 * ```typescript
 * datedBackupName('/logs/app.log', new Date(2024, 0, 15)) // '/logs/app.log.2024-01-15'
 * ```
 */
export function datedBackupName(filepath: string, date: Date): string {

    return `${filepath}.${formatLocalDate(date)}`
}


/**
 * First local midnight strictly after `from`.
 */
export function nextLocalMidnight(from: Date): Date {

    return new Date(from.getFullYear(), from.getMonth(), from.getDate() + 1)
}


/**
 * Check if a file of `size` bytes must rotate before taking `incoming` more.
 *
 * An empty file never rotates, so a single oversized line still lands.
 */
export function needsSizeRotation(size: number, incoming: number, maxBytes: number): boolean {

    if (maxBytes <= 0 || size === 0) {

        return false
    }

    return size + incoming > maxBytes
}


/**
 * Shift numbered backups and move the active file to `.1`.
 *
 * The file at `.backupCount` is deleted first. The caller owns the file
 * descriptor and must have closed it.
 *
 * @param filepath - Active log file
 * @param backupCount - Backups to keep (at least 1)
 */
export function rotateIndexed(filepath: string, backupCount: number): RotationResult {

    const deletedFiles: string[] = []
    const oldest = indexedBackupName(filepath, backupCount)

    if (existsSync(oldest)) {

        const [, err] = attemptSync(() => unlinkSync(oldest))

        if (!err) {

            deletedFiles.push(oldest)
        }
    }

    for (let i = backupCount - 1; i >= 1; i--) {

        const source = indexedBackupName(filepath, i)

        if (existsSync(source)) {

            renameSync(source, indexedBackupName(filepath, i + 1))
        }
    }

    const backup = indexedBackupName(filepath, 1)
    renameSync(filepath, backup)

    return {
        rotated: true,
        backup,
        deletedFiles: deletedFiles.length > 0 ? deletedFiles : undefined,
    }
}


/**
 * List dated backups for a given base file.
 *
 * @returns Backup paths, sorted newest first
 */
export function listDatedBackups(filepath: string): string[] {

    const dir = dirname(filepath)
    const base = basename(filepath)

    // Pattern: base.YYYY-MM-DD
    const pattern = new RegExp(`^${escapeRegex(base)}\\.\\d{4}-\\d{2}-\\d{2}$`)

    const [files, err] = attemptSync(() => readdirSync(dir))

    if (err) {

        return []
    }

    return files
        .filter((f) => pattern.test(f))
        .map((f) => join(dir, f))
        .sort()
        .reverse()  // Newest first
}


/**
 * Delete dated backups beyond `backupCount`.
 *
 * @returns Deleted file paths
 */
export function cleanupDatedBackups(filepath: string, backupCount: number): string[] {

    const toDelete = listDatedBackups(filepath).slice(backupCount)
    const deleted: string[] = []

    for (const file of toDelete) {

        const [, err] = attemptSync(() => unlinkSync(file))

        if (!err) {

            deleted.push(file)
        }
    }

    return deleted
}


/**
 * Move the active file to its dated backup and prune old backups.
 *
 * @param filepath - Active log file
 * @param day - Any instant inside the day the file covers
 * @param backupCount - Dated backups to keep
 */
export function rotateDated(filepath: string, day: Date, backupCount: number): RotationResult {

    const backup = datedBackupName(filepath, day)

    renameSync(filepath, backup)

    const deletedFiles = cleanupDatedBackups(filepath, backupCount)

    return {
        rotated: true,
        backup,
        deletedFiles: deletedFiles.length > 0 ? deletedFiles : undefined,
    }
}


/**
 * Escape special regex characters in a string.
 */
function escapeRegex(str: string): string {

    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
