/**
 * Log Context
 *
 * Scope-local fields merged into every record created while the scope
 * is active. Each async execution context has its own frame stack
 * (AsyncLocalStorage), so concurrent requests never see each other's
 * fields.
 *
 * @example
 * ```typescript
 * await withContext({ requestId: 'r1' }, async () => {
 *
 *     logger.info('received')                       // context.requestId = 'r1'
 *
 *     await withContext({ requestId: 'r2' }, async () => {
 *
 *         logger.info('retry')                      // context.requestId = 'r2'
 *     })
 *
 *     logger.info('done')                           // context.requestId = 'r1'
 * })
 * ```
 */
import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Handle returned by ContextStore.enter().
 */
export type ContextToken = symbol;

/**
 * One scope's contribution to the merged context.
 */
export interface ContextFrame {
    readonly token: ContextToken;
    readonly fields: Readonly<Record<string, unknown>>;
}

/**
 * Frame stack per async execution context.
 *
 * Stacks are never mutated in place. `run()` binds a new stack for the
 * duration of `fn`; `enter()`, `exit()` and `clear()` bind a new stack
 * to the current async context and the work it starts afterwards, so a
 * task's frames never reach a sibling task.
 *
 * `enter()` called before the first `await` of an async function runs
 * in its caller's context and binds the caller too. Use `run()` to
 * scope a task from its first line.
 */
export class ContextStore {

    readonly #storage = new AsyncLocalStorage<readonly ContextFrame[]>();

    /**
     * Run `fn` with `fields` pushed as a new frame.
     *
     * The frame is gone once `fn` returns, throws, or its promise
     * settles; the outer bindings are visible again unchanged.
     */
    run<T>(fields: Record<string, unknown>, fn: () => T): T {

        const frame: ContextFrame = { token: Symbol('context'), fields: { ...fields } };

        return this.#storage.run([...this.#stack(), frame], fn);

    }

    /**
     * Push a frame on the stack of the current async context.
     *
     * @returns Token to pass to exit()
     */
    enter(fields: Record<string, unknown>): ContextToken {

        const token: ContextToken = Symbol('context');

        this.#storage.enterWith([...this.#stack(), { token, fields: { ...fields } }]);

        return token;

    }

    /**
     * Pop the frame for `token` and any frame entered after it.
     *
     * Unknown or already exited tokens are ignored.
     */
    exit(token: ContextToken): void {

        const stack = this.#stack();
        const index = stack.findIndex((frame) => frame.token === token);

        if (index >= 0) {

            this.#storage.enterWith(stack.slice(0, index));

        }

    }

    /**
     * Deep merge of all active frames, innermost wins.
     */
    current(): Record<string, unknown> {

        let merged: Record<string, unknown> = {};

        for (const frame of this.#stack()) {

            merged = deepMerge(merged, frame.fields);

        }

        return merged;

    }

    /**
     * Number of active frames in the current async context.
     */
    get depth(): number {

        return this.#stack().length;

    }

    /**
     * Drop every frame of the current async context.
     */
    clear(): void {

        this.#storage.enterWith([]);

    }

    #stack(): readonly ContextFrame[] {

        return this.#storage.getStore() ?? [];

    }

}

/**
 * Merge plain objects recursively. Anything else in `source`,
 * arrays included, replaces the value in `target`.
 */
export function deepMerge(
    target: Readonly<Record<string, unknown>>,
    source: Readonly<Record<string, unknown>>,
): Record<string, unknown> {

    const result: Record<string, unknown> = { ...target };

    for (const [key, value] of Object.entries(source)) {

        const existing = result[key];

        result[key] = isPlainObject(existing) && isPlainObject(value)
            ? deepMerge(existing, value)
            : value;

    }

    return result;

}

function isPlainObject(value: unknown): value is Record<string, unknown> {

    if (value === null || typeof value !== 'object' || Array.isArray(value)) {

        return false;

    }

    const proto: unknown = Object.getPrototypeOf(value);

    return proto === Object.prototype || proto === null;

}

/**
 * Process-wide default store, used by loggers that are not given one.
 */
export const contextStore = new ContextStore();

/**
 * Run `fn` with `fields` added to the default context.
 */
export function withContext<T>(fields: Record<string, unknown>, fn: () => T): T {

    return contextStore.run(fields, fn);

}

/**
 * Merged fields of the default context.
 */
export function getContext(): Record<string, unknown> {

    return contextStore.current();

}
