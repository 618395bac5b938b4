import type { Kysely } from "kysely";
import { type Clock, systemClock } from "../clock";
import { createCountersRepo, TX_COUNTER } from "../db/counters-repo";
import type { Database } from "../db/index";
import { createStateRepo } from "../db/state-repo";
import { createTransactionsRepo } from "../db/transactions-repo";
import { StoreUnavailableError } from "../errors";
import type { Driver } from "./types";

/**
 * Driver over a migrated Kysely SQLite database.
 *
 * @remarks
 * - The state record is a single row; the conditional write is one
 *   `UPDATE ... WHERE baseline_timestamp = ?` statement.
 * - First-time initialization is `INSERT ... ON CONFLICT DO NOTHING`
 *   followed by a read, so racing initializers converge on one row.
 * - The counter is one upsert with `RETURNING`.
 */
export function createSqliteDriver(
	db: Kysely<Database>,
	{ clock = systemClock }: { clock?: Clock } = {},
): Driver {
	const stateRepo = createStateRepo(db);
	const countersRepo = createCountersRepo(db);
	const transactionsRepo = createTransactionsRepo(db);

	return {
		state: {
			read: () => stateRepo.get(),
			conditionalWrite: (expectedBaselineTimestamp, record) =>
				stateRepo.replaceIfVersion(expectedBaselineTimestamp, record),
			async ensureInitialized(defaults) {
				await stateRepo.insertIfMissing({
					names: defaults.names,
					baselineValues: defaults.values,
					rates: defaults.rates,
					baselineTimestamp: clock.now(),
				});
				const record = await stateRepo.get();
				if (!record) {
					throw new StoreUnavailableError(
						"State record missing after initialization.",
					);
				}
				return record;
			},
		},
		counter: {
			next: () => countersRepo.increment(TX_COUNTER),
		},
		log: {
			async append(entry) {
				await transactionsRepo.insert(entry);
			},
			listRecent: (limit) => transactionsRepo.listRecent(limit),
		},
		dispose: () => db.destroy(),
	};
}
