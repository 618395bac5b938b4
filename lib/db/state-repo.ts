import type { Kysely } from "kysely";
import { z } from "zod";
import type { StateRecord } from "../types";
import type { Database, NewStateRow, StateRow } from "./index";

export const STATE_ROW_ID = "live_state";

const stringArray = z.array(z.string());
const numberArray = z.array(z.number());

const encode = (record: StateRecord): Omit<NewStateRow, "id"> => ({
	names: JSON.stringify(record.names),
	baseline_values: JSON.stringify(record.baselineValues),
	rates: JSON.stringify(record.rates),
	baseline_timestamp: record.baselineTimestamp,
});

const decode = (row: StateRow): StateRecord => ({
	names: stringArray.parse(JSON.parse(row.names)),
	baselineValues: numberArray.parse(JSON.parse(row.baseline_values)),
	rates: numberArray.parse(JSON.parse(row.rates)),
	baselineTimestamp: row.baseline_timestamp,
});

export function createStateRepo(db: Kysely<Database>) {
	return {
		get: async (): Promise<StateRecord | null> => {
			const row = await db
				.selectFrom("state")
				.selectAll()
				.where("id", "=", STATE_ROW_ID)
				.executeTakeFirst();
			return row ? decode(row) : null;
		},
		insertIfMissing: (record: StateRecord) =>
			db
				.insertInto("state")
				.values({ id: STATE_ROW_ID, ...encode(record) })
				.onConflict((oc) => oc.column("id").doNothing())
				.executeTakeFirst(),
		replaceIfVersion: async (
			expectedBaselineTimestamp: number,
			record: StateRecord,
		): Promise<boolean> => {
			const result = await db
				.updateTable("state")
				.set(encode(record))
				.where("id", "=", STATE_ROW_ID)
				.where("baseline_timestamp", "=", expectedBaselineTimestamp)
				.executeTakeFirst();
			return Number(result.numUpdatedRows) === 1;
		},
	};
}
