import { type Clock, systemClock } from "../clock";
import { cloneRecord, type StateRecord, type TransactionLogEntry } from "../types";
import { compareNewestFirst } from "./ordering";
import type { Driver, InitialEntries } from "./types";

/**
 * In-process driver. Each operation finishes its compare and replace in a
 * single synchronous step, so it is atomic with respect to every other
 * caller on the event loop.
 */
export function createMemoryDriver({
	clock = systemClock,
	initial = null,
}: {
	clock?: Clock;
	initial?: StateRecord | null;
} = {}): Driver {
	let record: StateRecord | null = initial ? cloneRecord(initial) : null;
	let counter = 0;
	const entries: TransactionLogEntry[] = [];

	return {
		state: {
			read() {
				return Promise.resolve(record ? cloneRecord(record) : null);
			},
			conditionalWrite(expectedBaselineTimestamp, next) {
				if (!record || record.baselineTimestamp !== expectedBaselineTimestamp) {
					return Promise.resolve(false);
				}
				record = cloneRecord(next);
				return Promise.resolve(true);
			},
			ensureInitialized(defaults: InitialEntries) {
				if (!record) {
					record = {
						names: [...defaults.names],
						baselineValues: [...defaults.values],
						rates: [...defaults.rates],
						baselineTimestamp: clock.now(),
					};
				}
				return Promise.resolve(cloneRecord(record));
			},
		},
		counter: {
			next() {
				counter += 1;
				return Promise.resolve(counter);
			},
		},
		log: {
			append(entry) {
				entries.push({ ...entry });
				return Promise.resolve();
			},
			listRecent(limit) {
				return Promise.resolve(
					[...entries].sort(compareNewestFirst).slice(0, Math.max(0, limit)),
				);
			},
		},
		dispose() {
			return Promise.resolve();
		},
	};
}
