import {
	CompiledQuery,
	type DatabaseConnection,
	type Dialect,
	type Driver,
	type QueryResult,
	SqliteAdapter,
	SqliteIntrospector,
	SqliteQueryCompiler,
} from "kysely";
import type { Database as SqlJsDatabase, SqlValue } from "sql.js";

export type SqlJsDialectConfig = {
	/** Opens the database; called once, on the first query. */
	open: () => Promise<SqlJsDatabase>;
	/**
	 * Receives an image of the whole database after each write that is not
	 * inside a transaction, and after each commit.
	 */
	onWrite?: (image: Uint8Array) => Promise<void>;
};

const toSqlValue = (value: unknown): SqlValue => {
	if (value === null || value === undefined) return null;
	if (
		typeof value === "number" ||
		typeof value === "string" ||
		value instanceof Uint8Array
	) {
		return value;
	}
	if (typeof value === "boolean") return value ? 1 : 0;
	if (typeof value === "bigint") return Number(value);
	throw new TypeError(`Unsupported SQLite parameter of type ${typeof value}`);
};

/**
 * Kysely dialect over sql.js, SQLite compiled to WebAssembly. The engine
 * is in-process and single-threaded; one connection is shared and handed
 * out under a lock, so statements never interleave.
 */
export function createSqlJsDialect(config: SqlJsDialectConfig): Dialect {
	return {
		createDriver: () => createSqlJsDriver(config),
		createQueryCompiler: () => new SqliteQueryCompiler(),
		createAdapter: () => new SqliteAdapter(),
		createIntrospector: (db) => new SqliteIntrospector(db),
	};
}

function createSqlJsDriver({ open, onWrite }: SqlJsDialectConfig): Driver {
	let database: SqlJsDatabase | null = null;
	let inTransaction = false;
	let locked = false;
	const waiters: (() => void)[] = [];

	const lock = async () => {
		if (!locked) {
			locked = true;
			return;
		}
		await new Promise<void>((resolve) => waiters.push(resolve));
	};

	const unlock = () => {
		const next = waiters.shift();
		if (next) {
			next();
		} else {
			locked = false;
		}
	};

	const opened = () => {
		if (!database) throw new Error("sql.js database is not open");
		return database;
	};

	const persist = async () => {
		if (onWrite) await onWrite(opened().export());
	};

	async function executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
		const db = opened();
		const statement = db.prepare(compiledQuery.sql);
		const rows: unknown[] = [];
		try {
			statement.bind(compiledQuery.parameters.map(toSqlValue));
			while (statement.step()) {
				rows.push(statement.getAsObject());
			}
		} finally {
			statement.free();
		}
		const numAffectedRows = BigInt(db.getRowsModified());

		if (compiledQuery.query.kind !== "SelectQueryNode" && !inTransaction) {
			await persist();
		}

		// The engine returns plain column maps; the query builder owns the row type.
		return { rows: rows as R[], numAffectedRows };
	}

	const connection: DatabaseConnection = {
		executeQuery,
		async *streamQuery<R>(compiledQuery: CompiledQuery) {
			yield await executeQuery<R>(compiledQuery);
		},
	};

	return {
		async init() {
			database = await open();
		},
		async acquireConnection() {
			await lock();
			return connection;
		},
		async beginTransaction(conn) {
			inTransaction = true;
			await conn.executeQuery(CompiledQuery.raw("begin"));
		},
		async commitTransaction(conn) {
			await conn.executeQuery(CompiledQuery.raw("commit"));
			inTransaction = false;
			await persist();
		},
		async rollbackTransaction(conn) {
			await conn.executeQuery(CompiledQuery.raw("rollback"));
			inTransaction = false;
		},
		async releaseConnection() {
			unlock();
		},
		async destroy() {
			database?.close();
			database = null;
		},
	};
}
