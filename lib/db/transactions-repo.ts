import type { Kysely } from "kysely";
import type { TransactionLogEntry } from "../types";
import type { Database, TransactionRow } from "./index";

const toEntry = (row: TransactionRow): TransactionLogEntry => ({
	txId: row.tx_id,
	timestamp: row.timestamp,
	entryName: row.entry_name,
	deltaAmount: row.delta_amount,
	note: row.note,
	actor: row.actor,
});

export function createTransactionsRepo(db: Kysely<Database>) {
	return {
		insert: (entry: TransactionLogEntry) =>
			db
				.insertInto("transactions")
				.values({
					tx_id: entry.txId,
					timestamp: entry.timestamp,
					entry_name: entry.entryName,
					delta_amount: entry.deltaAmount,
					note: entry.note,
					actor: entry.actor,
				})
				.executeTakeFirstOrThrow(),
		listRecent: async (limit: number): Promise<TransactionLogEntry[]> => {
			const rows = await db
				.selectFrom("transactions")
				.selectAll()
				.orderBy("timestamp", "desc")
				.orderBy("tx_id", "desc")
				.limit(Math.max(0, limit))
				.execute();
			return rows.map(toEntry);
		},
	};
}
