import {
	type Insertable,
	Kysely,
	type Migration,
	type MigrationProvider,
	Migrator,
	type Selectable,
} from "kysely";
import initSqlJs, { type SqlJsStatic } from "sql.js";
import type { Storage } from "unstorage";
import { createLogger, type Logger } from "../logger";
import * as init from "./migrations/000-init";
import { createSqlJsDialect } from "./sqljs-dialect";

export interface StateTable {
	id: string;
	/** JSON array of strings. */
	names: string;
	/** JSON array of numbers. */
	baseline_values: string;
	/** JSON array of numbers. */
	rates: string;
	baseline_timestamp: number;
}

export interface CountersTable {
	name: string;
	value: number;
}

export interface TransactionsTable {
	tx_id: number;
	timestamp: number;
	entry_name: string;
	delta_amount: number;
	note: string;
	actor: string;
}

export interface Database {
	state: StateTable;
	counters: CountersTable;
	transactions: TransactionsTable;
}

export type StateRow = Selectable<StateTable>;
export type NewStateRow = Insertable<StateTable>;

export type TransactionRow = Selectable<TransactionsTable>;
export type NewTransactionRow = Insertable<TransactionsTable>;

const migrations: Record<string, Migration> = {
	"000-init": init,
};

const inlineMigrationProvider: MigrationProvider = {
	getMigrations: () => Promise.resolve(migrations),
};

export async function migrateToLatest(
	db: Kysely<Database>,
	logger: Logger = createLogger("db"),
) {
	const migrator = new Migrator({ db, provider: inlineMigrationProvider });

	const { error, results } = await migrator.migrateToLatest();

	results?.forEach((it) => {
		if (it.status === "Success") {
			logger.info(`migration "${it.migrationName}" was executed successfully`);
		} else if (it.status === "Error") {
			logger.error(`failed to execute migration "${it.migrationName}"`);
		}
	});

	if (error) {
		logger.error("failed to migrate", error);
		throw error;
	}
}

let sqlJs: Promise<SqlJsStatic> | undefined;
const loadSqlJs = () => {
	sqlJs ??= initSqlJs();
	return sqlJs;
};

/** Where a database image is kept between runs. */
export type DatabaseFile = {
	storage: Storage;
	key: string;
};

const readImage = async ({ storage, key }: DatabaseFile) => {
	const image: unknown = await storage.getItemRaw(key);
	return image instanceof Uint8Array ? image : null;
};

/**
 * Open the dashboard database. With a `file`, the image is loaded from
 * storage on first use and written back after every write; without one
 * the database lives in memory only.
 */
export function createDatabase(file?: DatabaseFile) {
	return new Kysely<Database>({
		dialect: createSqlJsDialect({
			open: async () => {
				const SQL = await loadSqlJs();
				const image = file ? await readImage(file) : null;
				return new SQL.Database(image);
			},
			onWrite: file
				? (image) => file.storage.setItemRaw(file.key, image)
				: undefined,
		}),
	});
}
