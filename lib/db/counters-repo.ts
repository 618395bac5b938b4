import type { Kysely } from "kysely";
import type { Database } from "./index";

export const TX_COUNTER = "tx_counter";

export function createCountersRepo(db: Kysely<Database>) {
	return {
		/** Single upsert statement, so concurrent callers never share a value. */
		increment: async (name: string): Promise<number> => {
			const row = await db
				.insertInto("counters")
				.values({ name, value: 1 })
				.onConflict((oc) =>
					oc.column("name").doUpdateSet((eb) => ({
						value: eb("counters.value", "+", 1),
					})),
				)
				.returning("value")
				.executeTakeFirstOrThrow();
			return row.value;
		},
	};
}
