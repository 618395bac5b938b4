import type { StateRecord, TransactionLogEntry } from "../types";

export type InitialEntries = {
	names: string[];
	values: number[];
	rates: number[];
};

export type StateStore = {
	/** Current authoritative record, or `null` before initialization. */
	read(): Promise<StateRecord | null>;
	/**
	 * Replace the whole record iff its stored baseline timestamp equals
	 * `expectedBaselineTimestamp`. Resolves to whether the write took effect.
	 */
	conditionalWrite(
		expectedBaselineTimestamp: number,
		record: StateRecord,
	): Promise<boolean>;
	/**
	 * Create the record stamped `now` when none exists, otherwise return the
	 * stored one unchanged. Concurrent callers never create two records.
	 */
	ensureInitialized(defaults: InitialEntries): Promise<StateRecord>;
};

export type SequenceCounter = {
	/** Atomically increment the persisted counter and return the new value. */
	next(): Promise<number>;
};

export type TransactionLog = {
	append(entry: TransactionLogEntry): Promise<void>;
	/** Newest first by timestamp, ties broken by `txId` descending. */
	listRecent(limit: number): Promise<TransactionLogEntry[]>;
};

export type Driver = {
	state: StateStore;
	counter: SequenceCounter;
	log: TransactionLog;
	dispose(): Promise<void>;
};
