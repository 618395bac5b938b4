import type { StateRecord } from "./types";

const MS_PER_SECOND = 1000;

/**
 * Signed seconds between two epoch-millisecond instants. Negative when
 * `atTime` precedes `from` (clock skew).
 */
export const elapsedSeconds = (from: number, atTime: number): number =>
	(atTime - from) / MS_PER_SECOND;

/**
 * Project baseline values forward (or backward) to `atTime` by linear
 * extrapolation at the given per-second rates.
 *
 * @example
 * ```typescript
 * project([0], [0.1], t0, t0 + 10_000); // [1]
 * ```
 */
export function project(
	baselineValues: readonly number[],
	rates: readonly number[],
	baselineTimestamp: number,
	atTime: number,
): number[] {
	const elapsed = elapsedSeconds(baselineTimestamp, atTime);
	return baselineValues.map((value, i) => value + (rates[i] ?? 0) * elapsed);
}

export const projectRecord = (record: StateRecord, atTime: number): number[] =>
	project(
		record.baselineValues,
		record.rates,
		record.baselineTimestamp,
		atTime,
	);
