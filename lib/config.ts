import type { Storage } from "unstorage";
import { z } from "zod";
import { describeError } from "./errors";
import type { LogLevel } from "./logger";

export const CONFIG_KEY = "config.json";

export const DEFAULT_CONFIG: DashboardConfig = {
	names: ["Var A", "Var B", "Var C", "Var D", "Var E"],
	startValues: [0, 10.5, 25, -5, 100],
	rates: [0.1, 0.1, 0.1, 0.1, 0.1],
	updatesPerSecond: 10,
	decimals: 4,
};

export const dashboardConfigSchema = z
	.object({
		names: z.array(z.string().trim().min(1)).min(1),
		startValues: z.array(z.coerce.number().finite()),
		rates: z.array(z.coerce.number().finite()),
		updatesPerSecond: z.number().int().min(1).max(60).default(10),
		decimals: z.number().int().min(0).max(12).default(4),
	})
	.refine(
		(config) =>
			config.names.length === config.startValues.length &&
			config.names.length === config.rates.length,
		{ message: "names, startValues and rates must have the same length" },
	)
	.refine((config) => new Set(config.names).size === config.names.length, {
		message: "names must be unique",
	});

export type DashboardConfig = z.infer<typeof dashboardConfigSchema>;

export type LoadedConfig = {
	config: DashboardConfig;
	/** Why the defaults were used instead of the stored config, if they were. */
	warning: string | null;
};

const formatIssues = (error: z.ZodError) =>
	error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");

/**
 * Read the dashboard config from `storage`. A missing config falls back to
 * the defaults silently; an unreadable or invalid one falls back with a
 * warning.
 */
export async function loadConfig(
	storage: Storage,
	key: string = CONFIG_KEY,
): Promise<LoadedConfig> {
	let raw: unknown;
	try {
		raw = await storage.getItem(key);
	} catch (error) {
		return {
			config: DEFAULT_CONFIG,
			warning: `Error reading ${key}: ${describeError(error)}. Using defaults.`,
		};
	}

	if (raw === null || raw === undefined) {
		return { config: DEFAULT_CONFIG, warning: null };
	}

	const parsed = dashboardConfigSchema.safeParse(raw);
	if (!parsed.success) {
		return {
			config: DEFAULT_CONFIG,
			warning: `${key} is invalid (${formatIssues(parsed.error)}). Using defaults.`,
		};
	}
	return { config: parsed.data, warning: null };
}

const logLevels = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

export const serverEnvSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(7860),
	DASHBOARD_DB_PATH: z.string().min(1).default("dashboard.sqlite"),
	DASHBOARD_DRIVER: z.enum(["sqlite", "memory"]).default("sqlite"),
	DASHBOARD_CONFIG_DIR: z.string().min(1).default("."),
	LOG_LEVEL: z.enum(logLevels).default("info"),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export const readServerEnv = (
	env: Record<string, string | undefined> = process.env,
): ServerEnv => serverEnvSchema.parse(env);
