import type { Clock } from "./clock";
import type { StateStore } from "./drivers/types";
import type { StateRecord } from "./types";

export const T0 = Date.UTC(2030, 0, 1, 12, 0, 0);

export type ManualClock = Clock & {
	set(ms: number): void;
	advance(ms: number): void;
};

export function createManualClock(start = T0): ManualClock {
	let current = start;
	return {
		now: () => current,
		set(ms) {
			current = ms;
		},
		advance(ms) {
			current += ms;
		},
	};
}

export function makeRecord(overrides: Partial<StateRecord> = {}): StateRecord {
	return {
		names: ["A", "B", "C"],
		baselineValues: [0, 10, 20],
		rates: [0.1, 1, -0.5],
		baselineTimestamp: T0,
		...overrides,
	};
}

/** Records requested delays without waiting. */
export function createRecordingSleep() {
	const delays: number[] = [];
	const sleep = (ms: number) => {
		delays.push(ms);
		return Promise.resolve();
	};
	return { sleep, delays };
}

/**
 * Wrap a state store so that `interfere` runs right before the wrapped
 * conditional write, simulating another writer that wins the race.
 */
export function withInterference(
	state: StateStore,
	interfere: (call: number) => Promise<void>,
): StateStore & { writes: number } {
	const wrapped = {
		writes: 0,
		read: () => state.read(),
		ensureInitialized: state.ensureInitialized,
		async conditionalWrite(expected: number, record: StateRecord) {
			wrapped.writes += 1;
			await interfere(wrapped.writes);
			return state.conditionalWrite(expected, record);
		},
	};
	return wrapped;
}
