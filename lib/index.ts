export { type Clock, stampAfter, systemClock } from "./clock";
export {
	CONFIG_KEY,
	DEFAULT_CONFIG,
	type DashboardConfig,
	dashboardConfigSchema,
	type LoadedConfig,
	loadConfig,
	readServerEnv,
	type ServerEnv,
} from "./config";
export {
	createDisplayPayload,
	type DisplayPayload,
	type DisplaySettings,
	formatValue,
	refreshIntervalMs,
} from "./display";
export { createMemoryDriver } from "./drivers/memory-driver";
export { createSqliteDriver } from "./drivers/sqlite-driver";
export type {
	Driver,
	InitialEntries,
	SequenceCounter,
	StateStore,
	TransactionLog,
} from "./drivers/types";
export * from "./errors";
export { createLogger, type Logger, type LogLevel, silentLogger } from "./logger";
export {
	createMutationService,
	type MutationEvents,
	type MutationService,
	type Snapshot,
} from "./mutations/mutation-service";
export { elapsedSeconds, project, projectRecord } from "./projection";
export { createSession, type SessionContext } from "./session";
export * from "./types";
