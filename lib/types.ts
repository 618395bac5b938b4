/** Parallel vectors describing every entry, position by position. */
export type EntryVectors = {
	names: string[];
	values: number[];
	rates: number[];
};

export type StateRecord = {
	names: string[];
	baselineValues: number[];
	/** Units per second. */
	rates: number[];
	/** Milliseconds since the Unix epoch, UTC. */
	baselineTimestamp: number;
};

export type TransactionLogEntry = {
	txId: number;
	timestamp: number;
	entryName: string;
	deltaAmount: number;
	note: string;
	actor: string;
};

export type OperationKind = "subtract" | "add-entry" | "edit-entry" | "delete-entry";

/** Which candidate view the committing attempt started from. */
export type CommitPath = "cached" | "fresh";

export type FailureReason = "validation" | "conflict" | "unavailable";

export type MutationOutcome =
	| {
			ok: true;
			message: string;
			record: StateRecord;
			attempts: number;
			path: CommitPath;
			warning?: string;
	  }
	| {
			ok: false;
			message: string;
			reason: FailureReason;
	  };

export const cloneRecord = (record: StateRecord): StateRecord => ({
	names: [...record.names],
	baselineValues: [...record.baselineValues],
	rates: [...record.rates],
	baselineTimestamp: record.baselineTimestamp,
});
