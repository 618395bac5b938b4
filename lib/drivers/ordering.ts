import type { TransactionLogEntry } from "../types";

export const compareNewestFirst = (
	a: TransactionLogEntry,
	b: TransactionLogEntry,
): number => b.timestamp - a.timestamp || b.txId - a.txId;
