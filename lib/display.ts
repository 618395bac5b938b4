import { project } from "./projection";
import type { StateRecord } from "./types";

export type DisplaySettings = {
	updatesPerSecond: number;
	decimals: number;
};

export type DisplayEntry = {
	name: string;
	valueAtRender: number;
	rate: number;
};

/**
 * Everything the browser needs to animate the entries without asking the
 * server again: values pinned at `renderedAt`, plus their rates.
 */
export type DisplayPayload = DisplaySettings & {
	entries: DisplayEntry[];
	renderedAt: number;
	baselineTimestamp: number;
	/** Period of the browser's refresh timer. */
	intervalMs: number;
};

/** Milliseconds between display refreshes. */
export const refreshIntervalMs = (updatesPerSecond: number) =>
	Math.round(1000 / Math.max(1, updatesPerSecond));

export function createDisplayPayload(
	record: StateRecord,
	renderedAt: number,
	settings: DisplaySettings,
): DisplayPayload {
	const values = project(
		record.baselineValues,
		record.rates,
		record.baselineTimestamp,
		renderedAt,
	);
	return {
		entries: record.names.map((name, i) => ({
			name,
			valueAtRender: values[i] ?? 0,
			rate: record.rates[i] ?? 0,
		})),
		renderedAt,
		baselineTimestamp: record.baselineTimestamp,
		updatesPerSecond: Math.max(1, Math.round(settings.updatesPerSecond)),
		decimals: settings.decimals,
		intervalMs: refreshIntervalMs(settings.updatesPerSecond),
	};
}

export const formatValue = (value: number, decimals: number): string => {
	const fixed = value.toFixed(decimals);
	// toFixed keeps the sign of tiny negatives ("-0.0000")
	return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
};
