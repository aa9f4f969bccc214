/**
 * Sensitive Field Redaction
 *
 * Masks values whose key names look sensitive. Matching is on the key,
 * never the value: a key is sensitive when its normalized form
 * (lowercase, no `-`, `_` or spaces) contains a normalized blocklist
 * entry. `user_password_hint`, `userPasswordHint` and `X-Api-Key` all
 * match.
 *
 * @example
 * ```typescript
 * redactFields({ password: 'abc123', orderId: 7 })
 * // => { password: '[REDACTED]', orderId: 7 }
 * ```
 */

/**
 * Placeholder substituted for a sensitive value. The key is kept so
 * consumers can see the field was present.
 */
export const REDACTION_SENTINEL = '[REDACTED]';

/**
 * Built-in blocklist.
 */
export const DEFAULT_SENSITIVE_KEYS: readonly string[] = Object.freeze([
    'password',
    'token',
    'secret',
    'api_key',
    'authorization',
    'credential',
    'private_key',
    'ssn',
    'credit_card',
    'cvv',
    'pin',
    'session_id',
    'cookie',
    'csrf_token',
]);

const MAX_DEPTH = 8;

// Normalized process-wide blocklist
const SENSITIVE_KEYS = new Set<string>();

/**
 * Lowercase and remove separators, so snake, kebab and camel
 * spellings compare equal.
 */
export function normalizeKey(key: string): string {

    return key.replace(/[-_\s]/g, '').toLowerCase();

}

/**
 * Extend the process-wide blocklist.
 *
 * @param keys - Key names in any casing
 */
export function addSensitiveKeys(keys: readonly string[]): void {

    for (const key of keys) {

        const normalized = normalizeKey(key);

        if (normalized) {

            SENSITIVE_KEYS.add(normalized);

        }

    }

}

/**
 * Restore the process-wide blocklist to the built-in entries.
 */
export function resetSensitiveKeys(): void {

    SENSITIVE_KEYS.clear();
    addSensitiveKeys(DEFAULT_SENSITIVE_KEYS);

}

resetSensitiveKeys();

/**
 * Snapshot of the normalized process-wide blocklist.
 */
export function getSensitiveKeys(): string[] {

    return [...SENSITIVE_KEYS];

}

/**
 * Build a key matcher over the process-wide blocklist plus `extraKeys`.
 *
 * The process-wide list is read on every call, so keys registered
 * later with addSensitiveKeys still apply.
 */
export function makeKeyMatcher(extraKeys: readonly string[] = []): (key: string) => boolean {

    const extra = extraKeys.map(normalizeKey).filter(Boolean);

    return (key: string) => {

        const normalized = normalizeKey(key);

        for (const entry of SENSITIVE_KEYS) {

            if (normalized.includes(entry)) return true;

        }

        return extra.some((entry) => normalized.includes(entry));

    };

}

/**
 * Check a single key against the process-wide blocklist.
 */
export function isSensitiveKey(key: string): boolean {

    return makeKeyMatcher()(key);

}

/**
 * Placeholder for a nested object past the depth limit.
 */
export const TRUNCATION_SENTINEL = '[Truncated]';

/**
 * Redact a field map, recursing into plain objects and arrays.
 *
 * Returns a new object; the input is not mutated. Every plain object
 * or array is copied once: a second reference to it, cycles included,
 * points at the same redacted copy. Objects nested deeper than the
 * depth limit become TRUNCATION_SENTINEL. Values other than plain
 * objects and arrays (dates, errors, class instances) are copied by
 * reference unless their key matches.
 *
 * @example
 * ```typescript
 * const creds = { password: 'abc123' }
 * redactFields({ primary: creds, fallback: creds })
 * // => { primary: { password: '[REDACTED]' }, fallback: { password: '[REDACTED]' } }
 * ```
 */
export function redactFields(
    fields: Readonly<Record<string, unknown>>,
    matches: (key: string) => boolean = makeKeyMatcher(),
): Record<string, unknown> {

    return redactObject(fields, matches, new WeakMap<object, unknown>(), 0);

}

function redactObject(
    obj: Readonly<Record<string, unknown>>,
    matches: (key: string) => boolean,
    copies: WeakMap<object, unknown>,
    depth: number,
): Record<string, unknown> {

    const result: Record<string, unknown> = {};

    // Registered before recursing so cycles resolve to the copy
    copies.set(obj, result);

    for (const [key, value] of Object.entries(obj)) {

        result[key] = matches(key)
            ? REDACTION_SENTINEL
            : redactValue(value, matches, copies, depth + 1);

    }

    return result;

}

function redactValue(
    value: unknown,
    matches: (key: string) => boolean,
    copies: WeakMap<object, unknown>,
    depth: number,
): unknown {

    if (value === null || typeof value !== 'object') {

        return value;

    }

    if (copies.has(value)) {

        return copies.get(value);

    }

    if (Array.isArray(value)) {

        if (depth >= MAX_DEPTH) {

            return TRUNCATION_SENTINEL;

        }

        const result: unknown[] = [];
        copies.set(value, result);

        for (const item of value) {

            result.push(redactValue(item, matches, copies, depth + 1));

        }

        return result;

    }

    if (isPlainObject(value)) {

        return depth >= MAX_DEPTH
            ? TRUNCATION_SENTINEL
            : redactObject(value, matches, copies, depth);

    }

    return value;

}

function isPlainObject(value: object): value is Record<string, unknown> {

    const proto: unknown = Object.getPrototypeOf(value);

    return proto === Object.prototype || proto === null;

}
