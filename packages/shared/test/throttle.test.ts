import { afterEach, beforeEach, expect, test, vi } from "vitest"
import { throttle } from "../src/throttle"

beforeEach(() => {
	vi.useFakeTimers()
	vi.setSystemTime(0)
})

afterEach(() => {
	vi.useRealTimers()
})

test("throttle drops calls inside the time frame", () => {
	const log = vi.fn()
	const logEverySecond = throttle(log, 1_000)

	logEverySecond("a")
	vi.setSystemTime(500)
	logEverySecond("b")
	vi.setSystemTime(1_000)
	logEverySecond("c")

	expect(log.mock.calls).toEqual([["a"], ["c"]])
})
