import { expect, test } from "vitest";
import { stampAfter, systemClock } from "./clock";
import { createManualClock, T0 } from "./test-helpers";

test("stampAfter returns the wall clock when it is past the previous stamp", () => {
	const clock = createManualClock(T0 + 5_000);

	expect(stampAfter(clock, T0)).toBe(T0 + 5_000);
});

test("stampAfter moves one millisecond past a stamp from the same millisecond", () => {
	const clock = createManualClock(T0);

	expect(stampAfter(clock, T0)).toBe(T0 + 1);
});

test("stampAfter moves past a previous stamp that is ahead of the wall clock", () => {
	const clock = createManualClock(T0);

	expect(stampAfter(clock, T0 + 300)).toBe(T0 + 301);
});

test("systemClock reports epoch milliseconds", () => {
	const before = Date.now();
	const now = systemClock.now();
	const after = Date.now();

	expect(now).toBeGreaterThanOrEqual(before);
	expect(now).toBeLessThanOrEqual(after);
});
