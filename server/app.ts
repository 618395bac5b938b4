import { type Context, Hono } from "hono";
import { getCookie, setCookie } from "hono/cookie";
import { z } from "zod";
import { type Clock, systemClock } from "../lib/clock";
import type { LoadedConfig } from "../lib/config";
import { createDisplayPayload, type DisplaySettings } from "../lib/display";
import { DashboardError, failureReasonOf } from "../lib/errors";
import { type Logger, silentLogger } from "../lib/logger";
import type { MutationService } from "../lib/mutations/mutation-service";
import type { SessionContext } from "../lib/session";
import type { FailureReason, MutationOutcome } from "../lib/types";
import { renderDashboard } from "./dashboard";
import { SESSION_COOKIE, type SessionRegistry } from "./sessions";

export type IdentityProvider = (c: Context) => string;

export type AppConfig = {
	service: MutationService;
	sessions: SessionRegistry;
	display: DisplaySettings;
	configWarning?: string | null;
	/** Re-reads the dashboard config; only display settings are taken from it. */
	reloadConfig: () => Promise<LoadedConfig>;
	identify?: IdentityProvider;
	clock?: Clock;
	logger?: Logger;
};

type Env = { Variables: { session: SessionContext } };

const headerIdentity: IdentityProvider = (c) => c.req.header("x-actor") ?? "";

const indexParam = z.coerce.number().int().min(0);

const subtractBody = z.object({
	amount: z.number(),
	note: z.string().max(500).optional(),
	expectedName: z.string().optional(),
});

const addEntryBody = z.object({
	name: z.string(),
	startValue: z.number(),
	rate: z.number(),
});

const editEntryBody = z.object({
	name: z.string(),
	currentValue: z.number(),
	rate: z.number(),
	expectedName: z.string().optional(),
});

const deleteEntryBody = z.object({
	expectedName: z.string().optional(),
});

const limitQuery = z.coerce.number().int().min(1).max(200).default(20);

const STATUS_BY_REASON = {
	validation: 400,
	conflict: 409,
	unavailable: 503,
} as const satisfies Record<FailureReason, number>;

type Parsed<T> = { ok: true; data: T } | { ok: false; message: string };

async function parseBody<T>(c: Context, schema: z.ZodType<T>): Promise<Parsed<T>> {
	let raw: unknown;
	try {
		const text = await c.req.text();
		raw = text.trim() === "" ? {} : JSON.parse(text);
	} catch {
		return { ok: false, message: "Request body must be valid JSON." };
	}
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		return {
			ok: false,
			message: parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
				.join("; "),
		};
	}
	return { ok: true, data: parsed.data };
}

const reject = (c: Context, message: string) =>
	c.json({ ok: false, message, reason: "validation" }, 400);

const respond = (c: Context, outcome: MutationOutcome) =>
	outcome.ok ? c.json(outcome, 200) : c.json(outcome, STATUS_BY_REASON[outcome.reason]);

const storeFailure = (c: Context, error: unknown) => {
	if (error instanceof DashboardError) {
		const reason = failureReasonOf(error);
		return c.json(
			{ ok: false, message: error.message, reason },
			STATUS_BY_REASON[reason],
		);
	}
	throw error;
};

export function createApp({
	service,
	sessions,
	display: initialDisplay,
	configWarning: initialWarning = null,
	reloadConfig,
	identify = headerIdentity,
	clock = systemClock,
	logger = silentLogger,
}: AppConfig) {
	const app = new Hono<Env>();
	let display: DisplaySettings = { ...initialDisplay };
	let configWarning = initialWarning;

	const configView = () => ({
		updatesPerSecond: display.updatesPerSecond,
		decimals: display.decimals,
		warning: configWarning,
	});

	app.use("*", async (c, next) => {
		const session = sessions.resolve(getCookie(c, SESSION_COOKIE), identify(c));
		setCookie(c, SESSION_COOKIE, session.id, {
			httpOnly: true,
			sameSite: "Lax",
			path: "/",
		});
		c.set("session", session);
		await next();
	});

	const payloadFor = async (session: SessionContext) => {
		const snapshot = await service.snapshot(session);
		return createDisplayPayload(snapshot.record, snapshot.readAt, display);
	};

	app.get("/", async (c) => {
		try {
			const payload = await payloadFor(c.get("session"));
			return c.html(renderDashboard({ payload, configWarning }));
		} catch (error) {
			return storeFailure(c, error);
		}
	});

	app.get("/api/state", async (c) => {
		try {
			return c.json(await payloadFor(c.get("session")));
		} catch (error) {
			return storeFailure(c, error);
		}
	});

	app.get("/api/config", (c) =>
		c.json({ ...configView(), serverTime: clock.now() }),
	);

	// Stored entries are never touched: names, start values and rates in the
	// file only seed an empty store.
	app.post("/api/config/reload", async (c) => {
		const { config, warning } = await reloadConfig();
		display = {
			updatesPerSecond: config.updatesPerSecond,
			decimals: config.decimals,
		};
		configWarning = warning;
		logger.info(warning ? `config reloaded with warning: ${warning}` : "config reloaded");
		return c.json({
			ok: warning === null,
			message:
				warning === null
					? "Config reloaded. Stored entries are unchanged."
					: `Config reloaded with a warning: ${warning}`,
			...configView(),
		});
	});

	app.get("/api/transactions", async (c) => {
		const limit = limitQuery.safeParse(c.req.query("limit"));
		if (!limit.success) return reject(c, "limit must be an integer between 1 and 200.");
		const transactions = await service.listRecent(limit.data);
		return c.json({ transactions });
	});

	app.post("/api/entries/:index/subtract", async (c) => {
		const index = indexParam.safeParse(c.req.param("index"));
		if (!index.success) return reject(c, "Index must be a non-negative integer.");
		const body = await parseBody(c, subtractBody);
		if (!body.ok) return reject(c, body.message);
		return respond(
			c,
			await service.subtract(c.get("session"), {
				index: index.data,
				amount: body.data.amount,
				note: body.data.note,
			}),
		);
	});

	app.post("/api/entries", async (c) => {
		const body = await parseBody(c, addEntryBody);
		if (!body.ok) return reject(c, body.message);
		return respond(c, await service.addEntry(c.get("session"), body.data));
	});

	app.put("/api/entries/:index", async (c) => {
		const index = indexParam.safeParse(c.req.param("index"));
		if (!index.success) return reject(c, "Index must be a non-negative integer.");
		const body = await parseBody(c, editEntryBody);
		if (!body.ok) return reject(c, body.message);
		return respond(
			c,
			await service.editEntry(c.get("session"), {
				index: index.data,
				...body.data,
			}),
		);
	});

	app.delete("/api/entries/:index", async (c) => {
		const index = indexParam.safeParse(c.req.param("index"));
		if (!index.success) return reject(c, "Index must be a non-negative integer.");
		const body = await parseBody(c, deleteEntryBody);
		if (!body.ok) return reject(c, body.message);
		return respond(
			c,
			await service.deleteEntry(c.get("session"), {
				index: index.data,
				expectedName: body.data.expectedName,
			}),
		);
	});

	app.onError((error, c) => {
		logger.error(`unhandled error on ${c.req.method} ${c.req.path}`, error);
		return c.json(
			{ ok: false, message: "Internal server error.", reason: "unavailable" },
			500,
		);
	});

	return app;
}
