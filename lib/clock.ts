export type Clock = {
	/** Current wall-clock time in epoch milliseconds (UTC). */
	now(): number;
};

export const systemClock: Clock = {
	now: () => Date.now(),
};

/**
 * Returns the baseline timestamp for a write that supersedes `previous`.
 *
 * The baseline timestamp doubles as the record's version token, so a new
 * one must differ from every token a concurrent writer could still hold.
 * When the wall clock has not moved past `previous` (same millisecond, or
 * skew) the stamp is pushed one millisecond beyond it.
 */
export function stampAfter(clock: Clock, previous: number): number {
	const nowMs = clock.now();
	return nowMs > previous ? nowMs : previous + 1;
}
