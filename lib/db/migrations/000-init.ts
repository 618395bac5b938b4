import type { Kysely } from "kysely";

// Migrations are frozen against the schema they create, not the live one.
export async function up(db: Kysely<unknown>): Promise<void> {
	await db.schema
		.createTable("state")
		.ifNotExists()
		.addColumn("id", "text", (col) => col.primaryKey())
		.addColumn("names", "text", (col) => col.notNull())
		.addColumn("baseline_values", "text", (col) => col.notNull())
		.addColumn("rates", "text", (col) => col.notNull())
		.addColumn("baseline_timestamp", "integer", (col) => col.notNull())
		.execute();

	await db.schema
		.createTable("counters")
		.ifNotExists()
		.addColumn("name", "text", (col) => col.primaryKey())
		.addColumn("value", "integer", (col) => col.notNull().defaultTo(0))
		.execute();

	await db.schema
		.createTable("transactions")
		.ifNotExists()
		.addColumn("tx_id", "integer", (col) => col.primaryKey())
		.addColumn("timestamp", "integer", (col) => col.notNull())
		.addColumn("entry_name", "text", (col) => col.notNull())
		.addColumn("delta_amount", "real", (col) => col.notNull())
		.addColumn("note", "text", (col) => col.notNull().defaultTo(""))
		.addColumn("actor", "text", (col) => col.notNull().defaultTo(""))
		.execute();

	await db.schema
		.createIndex("idx_transactions_recent")
		.ifNotExists()
		.on("transactions")
		.columns(["timestamp", "tx_id"])
		.execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
	await db.schema.dropIndex("idx_transactions_recent").ifExists().execute();
	await db.schema.dropTable("transactions").ifExists().execute();
	await db.schema.dropTable("counters").ifExists().execute();
	await db.schema.dropTable("state").ifExists().execute();
}
