/**
 * Create a version of `func` that runs at most once per `timeFrame`
 * milliseconds. Calls inside the window are dropped.
 *
 * @example
 * ```ts
 * const logEverySecond = throttle(logger, 1_000)
 * for (const node of nodes) logEverySecond(`Loaded node ${node.id}`)
 * ```
 */
export function throttle<T extends unknown[]>(
	func: (...args: T) => void,
	timeFrame: number,
) {
	let lastTime = Number.NEGATIVE_INFINITY
	return (...args: T) => {
		const now = Date.now()
		if (now - lastTime < timeFrame) return
		lastTime = now
		func(...args)
	}
}
