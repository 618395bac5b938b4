import { basename, dirname } from "node:path";
import { serve } from "@hono/node-server";
import { createStorage } from "unstorage";
import fsDriver from "unstorage/drivers/fs";
import { loadConfig, readServerEnv } from "../lib/config";
import { createDatabase, migrateToLatest } from "../lib/db/index";
import { createMemoryDriver } from "../lib/drivers/memory-driver";
import { createSqliteDriver } from "../lib/drivers/sqlite-driver";
import type { Driver } from "../lib/drivers/types";
import { createLogger } from "../lib/logger";
import { createMutationService } from "../lib/mutations/mutation-service";
import { createApp } from "./app";
import { createSessionRegistry } from "./sessions";

const env = readServerEnv();
const logger = createLogger("dashboard", env.LOG_LEVEL);

const configStorage = createStorage({
	driver: fsDriver({ base: env.DASHBOARD_CONFIG_DIR }),
});
const { config, warning } = await loadConfig(configStorage);
if (warning) logger.warn(`config: ${warning}`);

async function openDriver(): Promise<Driver> {
	if (env.DASHBOARD_DRIVER === "memory") {
		logger.warn("using the in-memory driver; state will not survive a restart");
		return createMemoryDriver();
	}
	const db = createDatabase({
		storage: createStorage({
			driver: fsDriver({ base: dirname(env.DASHBOARD_DB_PATH) }),
		}),
		key: basename(env.DASHBOARD_DB_PATH),
	});
	await migrateToLatest(db, logger.child("db"));
	return createSqliteDriver(db);
}

const driver = await openDriver();
const initial = await driver.state.ensureInitialized({
	names: config.names,
	values: config.startValues,
	rates: config.rates,
});
logger.info(
	`state ready: ${initial.names.length} entries, baseline ${new Date(initial.baselineTimestamp).toISOString()}`,
);

const service = createMutationService({
	driver,
	logger: logger.child("mutations"),
});

service.on("committed", ({ operation, sessionId, attempts, path }) =>
	logger.debug(`${operation} committed for ${sessionId} (${path}, ${attempts} attempt(s))`),
);
service.on("conflict", ({ operation, sessionId, attempt }) =>
	logger.debug(`${operation} lost race on attempt ${attempt} for ${sessionId}`),
);
service.on("rejected", ({ operation, error }) => {
	if (error.code === "conflict_exhausted") {
		logger.warn(`${operation} gave up: ${error.message}`);
	}
});

const app = createApp({
	service,
	sessions: createSessionRegistry(),
	display: {
		updatesPerSecond: config.updatesPerSecond,
		decimals: config.decimals,
	},
	configWarning: warning,
	reloadConfig: () => loadConfig(configStorage),
	logger: logger.child("http"),
});

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
	logger.info(`🚀 Server running at http://localhost:${info.port}`);
});

const shutdown = (signal: string) => {
	logger.info(`${signal} received, shutting down`);
	service.dispose();
	server.close(() => {
		driver.dispose().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error("failed to close the store", error);
				process.exit(1);
			},
		);
	});
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
