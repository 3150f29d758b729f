const prefix = 'Invariant failed';

/**
 * Throws when `condition` is falsy, narrowing it to truthy otherwise.
 */
export function invariant(condition: unknown, message?: string | (() => string)): asserts condition {
    if (condition) {
        return;
    }
    const provided = typeof message === 'function' ? message() : message;
    throw new Error(provided ? `${prefix}: ${provided}` : prefix);
}
