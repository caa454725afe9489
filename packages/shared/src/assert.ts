/**
 * Assertion helpers for null/undefined guards.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @param value - The value to check.
 * @param message - Optional error message if assertion fails.
 * @throws Error if value is null or undefined.
 *
 * @example
 * ```ts
 * const ref = way.refs[0]
 * assertValue(ref, `Way ${way.id} has no nodes`)
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

