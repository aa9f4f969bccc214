/**
 * Console Color Theme
 *
 * Centralized colors for human-readable log output.
 * Uses ansis for truecolor (hex) support; ansis drops the escape codes
 * on its own when the process has no color support.
 *
 * @example
 * ```typescript
 * import { levelColors, theme } from '../theme.js'
 *
 * console.log(levelColors.ERROR('ERROR'))
 * console.log(theme.muted('request_id'))
 * ```
 */
import ansis from 'ansis';

import type { LogLevel } from './logger/types.js';

// ─────────────────────────────────────────────────────────────
// Color Palette
// ─────────────────────────────────────────────────────────────

/**
 * Slate palette. Hex values used directly with ansis truecolor.
 */
export const palette = {

    // Levels
    debug: '#8B5CF6',        // Purple
    info: '#3B82F6',         // Bright Blue
    warning: '#F59E0B',      // Amber
    error: '#EF4444',        // Red
    critical: '#DC2626',     // Deep Red

    // Text
    text: '#F3F4F6',         // Gray-100
    muted: '#9CA3AF',        // Gray-400
    number: '#10B981',       // Emerald Green

} as const;

// ─────────────────────────────────────────────────────────────
// Color Functions
// ─────────────────────────────────────────────────────────────

export const theme = {

    text: (text: string) => ansis.hex(palette.text)(text),
    muted: (text: string) => ansis.hex(palette.muted)(text),
    number: (text: string) => ansis.hex(palette.number)(text),
    error: (text: string) => ansis.hex(palette.error)(text),

} as const;

/**
 * Level label colors.
 */
export const levelColors: Record<LogLevel, (text: string) => string> = {
    DEBUG: (text) => ansis.hex(palette.debug)(text),
    INFO: (text) => ansis.hex(palette.info)(text),
    WARNING: (text) => ansis.hex(palette.warning)(text),
    ERROR: (text) => ansis.hex(palette.error)(text),
    CRITICAL: (text) => ansis.bold.hex(palette.critical)(text),
};
