import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFile, mkdir, rm, readFile, readdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import {
    parseSize,
    indexedBackupName,
    datedBackupName,
    formatLocalDate,
    nextLocalMidnight,
    needsSizeRotation,
    rotateIndexed,
    rotateDated,
    listDatedBackups,
    cleanupDatedBackups,
} from '../../../src/core/logger/rotation.js'


describe('logger: rotation', () => {

    let testDir: string

    beforeEach(async () => {

        testDir = join(tmpdir(), `logline-test-rotation-${Date.now()}-${Math.random().toString(36).slice(2)}`)
        await mkdir(testDir, { recursive: true })
    })

    afterEach(async () => {

        await rm(testDir, { recursive: true, force: true })
    })

    describe('parseSize', () => {

        it('should parse bytes', () => {

            expect(parseSize('100')).toBe(100)
            expect(parseSize('100b')).toBe(100)
            expect(parseSize('100B')).toBe(100)
        })

        it('should parse kilobytes', () => {

            expect(parseSize('1kb')).toBe(1024)
            expect(parseSize('2KB')).toBe(2048)
        })

        it('should parse megabytes', () => {

            expect(parseSize('1mb')).toBe(1024 * 1024)
            expect(parseSize('10MB')).toBe(10 * 1024 * 1024)
        })

        it('should parse gigabytes', () => {

            expect(parseSize('1gb')).toBe(1024 * 1024 * 1024)
        })

        it('should parse decimal values', () => {

            expect(parseSize('1.5mb')).toBe(Math.floor(1.5 * 1024 * 1024))
        })

        it('should throw on invalid format', () => {

            expect(() => parseSize('invalid')).toThrow('Invalid size format')
            expect(() => parseSize('')).toThrow('Invalid size format')
            expect(() => parseSize('abc')).toThrow('Invalid size format')
        })
    })

    describe('backup names', () => {

        it('should number size backups', () => {

            expect(indexedBackupName('/logs/app.log', 2)).toBe('/logs/app.log.2')
        })

        it('should date daily backups by local calendar day', () => {

            expect(formatLocalDate(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05')
            expect(datedBackupName('/logs/app.log', new Date(2024, 11, 31, 8))).toBe('/logs/app.log.2024-12-31')
        })
    })

    describe('nextLocalMidnight', () => {

        it('should return the start of the next local day', () => {

            expect(nextLocalMidnight(new Date(2024, 0, 15, 10, 30)).getTime()).toBe(new Date(2024, 0, 16).getTime())
        })

        it('should move past a midnight it starts on', () => {

            expect(nextLocalMidnight(new Date(2024, 0, 16)).getTime()).toBe(new Date(2024, 0, 17).getTime())
        })

        it('should roll over month and year ends', () => {

            expect(nextLocalMidnight(new Date(2024, 11, 31, 12)).getTime()).toBe(new Date(2025, 0, 1).getTime())
        })
    })

    describe('needsSizeRotation', () => {

        it('should rotate when the write would exceed the limit', () => {

            expect(needsSizeRotation(8, 5, 10)).toBe(true)
        })

        it('should not rotate when the write exactly fills the limit', () => {

            expect(needsSizeRotation(5, 5, 10)).toBe(false)
        })

        it('should never rotate an empty file', () => {

            expect(needsSizeRotation(0, 500, 10)).toBe(false)
        })

        it('should be disabled by a zero limit', () => {

            expect(needsSizeRotation(1000, 1000, 0)).toBe(false)
        })
    })

    describe('rotateIndexed', () => {

        it('should move the active file to .1 and shift older backups', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(file, 'current')
            await writeFile(`${file}.1`, 'one')

            const result = rotateIndexed(file, 3)

            expect(result).toEqual({ rotated: true, backup: `${file}.1`, deletedFiles: undefined })
            expect(existsSync(file)).toBe(false)
            expect(await readFile(`${file}.1`, 'utf8')).toBe('current')
            expect(await readFile(`${file}.2`, 'utf8')).toBe('one')
        })

        it('should delete the oldest backup at the limit', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(file, 'current')
            await writeFile(`${file}.1`, 'one')
            await writeFile(`${file}.2`, 'two')

            const result = rotateIndexed(file, 2)

            expect(result.deletedFiles).toEqual([`${file}.2`])
            expect(await readFile(`${file}.1`, 'utf8')).toBe('current')
            expect(await readFile(`${file}.2`, 'utf8')).toBe('one')
            expect(existsSync(`${file}.3`)).toBe(false)
        })
    })

    describe('listDatedBackups', () => {

        it('should return empty array if no backups exist', async () => {

            await writeFile(join(testDir, 'app.log'), '')

            expect(listDatedBackups(join(testDir, 'app.log'))).toEqual([])
        })

        it('should list backups newest first', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(`${file}.2024-01-14`, '')
            await writeFile(`${file}.2024-01-16`, '')
            await writeFile(`${file}.2024-01-15`, '')

            expect(listDatedBackups(file)).toEqual([
                `${file}.2024-01-16`,
                `${file}.2024-01-15`,
                `${file}.2024-01-14`,
            ])
        })

        it('should not include unrelated files', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(`${file}.2024-01-15`, '')
            await writeFile(`${file}.1`, '')
            await writeFile(join(testDir, 'other.log.2024-01-15'), '')

            expect(listDatedBackups(file)).toEqual([`${file}.2024-01-15`])
        })
    })

    describe('cleanupDatedBackups', () => {

        it('should keep the newest backups and delete the rest', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(`${file}.2024-01-14`, '')
            await writeFile(`${file}.2024-01-15`, '')
            await writeFile(`${file}.2024-01-16`, '')

            const deleted = cleanupDatedBackups(file, 2)

            expect(deleted).toEqual([`${file}.2024-01-14`])
            expect((await readdir(testDir)).sort()).toEqual(['app.log.2024-01-15', 'app.log.2024-01-16'])
        })

        it('should not delete anything under the limit', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(`${file}.2024-01-15`, '')

            expect(cleanupDatedBackups(file, 5)).toEqual([])
        })
    })

    describe('rotateDated', () => {

        it('should move the active file to its dated backup', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(file, 'yesterday')

            const result = rotateDated(file, new Date(2024, 0, 15, 18), 5)

            expect(result).toEqual({ rotated: true, backup: `${file}.2024-01-15`, deletedFiles: undefined })
            expect(existsSync(file)).toBe(false)
            expect(await readFile(`${file}.2024-01-15`, 'utf8')).toBe('yesterday')
        })

        it('should prune backups beyond the count', async () => {

            const file = join(testDir, 'app.log')
            await writeFile(`${file}.2024-01-13`, '')
            await writeFile(`${file}.2024-01-14`, '')
            await writeFile(file, 'x')

            const result = rotateDated(file, new Date(2024, 0, 15, 18), 2)

            expect(result.deletedFiles).toEqual([`${file}.2024-01-13`])
        })
    })
})
