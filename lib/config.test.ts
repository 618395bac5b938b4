import { createStorage } from "unstorage";
import memoryDriver from "unstorage/drivers/memory";
import { expect, test } from "vitest";
import { CONFIG_KEY, DEFAULT_CONFIG, loadConfig, readServerEnv } from "./config";

const storageWith = async (value?: unknown) => {
	const storage = createStorage({ driver: memoryDriver() });
	if (value !== undefined) await storage.setItem(CONFIG_KEY, value);
	return storage;
};

test("missing config falls back to the defaults without a warning", async () => {
	const loaded = await loadConfig(await storageWith());

	expect(loaded).toEqual({ config: DEFAULT_CONFIG, warning: null });
});

test("a valid config is returned with display defaults filled in", async () => {
	const loaded = await loadConfig(
		await storageWith({
			names: ["Rent", "Food"],
			startValues: [100, "2.5"],
			rates: [0.01, 0.02],
		}),
	);

	expect(loaded).toEqual({
		config: {
			names: ["Rent", "Food"],
			startValues: [100, 2.5],
			rates: [0.01, 0.02],
			updatesPerSecond: 10,
			decimals: 4,
		},
		warning: null,
	});
});

test("mismatched lengths fall back to the defaults with a warning", async () => {
	const loaded = await loadConfig(
		await storageWith({ names: ["A", "B"], startValues: [1], rates: [1, 2] }),
	);

	expect(loaded.config).toEqual(DEFAULT_CONFIG);
	expect(loaded.warning).toBe(
		"config.json is invalid (names, startValues and rates must have the same length). Using defaults.",
	);
});

test("duplicate names are rejected", async () => {
	const loaded = await loadConfig(
		await storageWith({ names: ["A", "A"], startValues: [1, 2], rates: [1, 2] }),
	);

	expect(loaded.warning).toBe("config.json is invalid (names must be unique). Using defaults.");
});

test("missing keys name the offending field", async () => {
	const loaded = await loadConfig(await storageWith({ names: ["A"], rates: [1] }));

	expect(loaded.config).toEqual(DEFAULT_CONFIG);
	expect(loaded.warning).toBe("config.json is invalid (startValues: Required). Using defaults.");
});

test("a storage error falls back to the defaults with a warning", async () => {
	const storage = await storageWith();
	storage.getItem = () => Promise.reject(new Error("permission denied"));

	const loaded = await loadConfig(storage);

	expect(loaded).toEqual({
		config: DEFAULT_CONFIG,
		warning: "Error reading config.json: permission denied. Using defaults.",
	});
});

test("readServerEnv applies defaults and coerces the port", () => {
	expect(readServerEnv({})).toEqual({
		PORT: 7860,
		DASHBOARD_DB_PATH: "dashboard.sqlite",
		DASHBOARD_DRIVER: "sqlite",
		DASHBOARD_CONFIG_DIR: ".",
		LOG_LEVEL: "info",
	});
	expect(readServerEnv({ PORT: "8080", DASHBOARD_DRIVER: "memory" })).toMatchObject({
		PORT: 8080,
		DASHBOARD_DRIVER: "memory",
	});
});

test("readServerEnv rejects an unknown driver", () => {
	expect(() => readServerEnv({ DASHBOARD_DRIVER: "mongo" })).toThrow();
});
