/**
 * @file Deep Freeze
 *
 * @module utils/freeze
 */

/**
 * Freeze a JSON-shaped value and everything reachable from it.
 *
 * @returns The same value, now immutable at every depth
 */
export function value_freeze<T>(value: T): T {
    if (typeof value !== 'object' || value === null) {
        return value;
    }
    Object.freeze(value);
    for (const member of Object.values(value)) {
        value_freeze(member);
    }
    return value;
}
