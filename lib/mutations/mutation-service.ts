import mitt from "mitt";
import { type Clock, systemClock } from "../clock";
import type { Driver } from "../drivers/types";
import {
	DashboardError,
	describeError,
	failureReasonOf,
	LogWriteFailedError,
} from "../errors";
import { type Logger, silentLogger } from "../logger";
import { projectRecord } from "../projection";
import type { SessionContext } from "../session";
import {
	type CommitPath,
	cloneRecord,
	type MutationOutcome,
	type OperationKind,
	type StateRecord,
	type TransactionLogEntry,
} from "../types";
import {
	type Committed,
	DEFAULT_MAX_ATTEMPTS,
	DEFAULT_RETRY_DELAY_MS,
	readRecord,
	runOptimisticMutation,
	sleep as defaultSleep,
} from "./protocol";
import {
	addEntryTransform,
	deleteEntryTransform,
	editEntryTransform,
	subtractTransform,
	type Transformation,
} from "./transforms";

export type MutationEvents = {
	committed: {
		operation: OperationKind;
		sessionId: string;
		record: StateRecord;
		attempts: number;
		path: CommitPath;
	};
	conflict: {
		operation: OperationKind;
		sessionId: string;
		attempt: number;
		path: CommitPath;
	};
	rejected: {
		operation: OperationKind;
		sessionId: string;
		error: DashboardError;
	};
	logFailed: {
		sessionId: string;
		error: LogWriteFailedError;
	};
};

export type SubtractRequest = {
	index: number;
	amount: number;
	note?: string;
	/** Name the caller saw at `index`; the subtraction is refused if it moved. */
	expectedName?: string;
};
export type AddEntryRequest = { name: string; startValue: number; rate: number };
export type EditEntryRequest = {
	index: number;
	name: string;
	currentValue: number;
	rate: number;
	expectedName?: string;
};
export type DeleteEntryRequest = { index: number; expectedName?: string };

export type Snapshot = {
	record: StateRecord;
	/** Projection of `record` at `readAt`. */
	values: number[];
	readAt: number;
};

export type MutationServiceConfig = {
	driver: Driver;
	clock?: Clock;
	sleep?: (ms: number) => Promise<void>;
	random?: () => number;
	maxAttempts?: number;
	retryDelayMs?: number;
	logger?: Logger;
};

export type MutationService = ReturnType<typeof createMutationService>;

const pathNote = (committed: Committed) =>
	committed.path === "cached" && committed.attempts === 1
		? "fast path"
		: committed.attempts === 1
			? "fresh read"
			: `committed after ${committed.attempts} attempts`;

export function createMutationService({
	driver,
	clock = systemClock,
	sleep = defaultSleep,
	random = Math.random,
	maxAttempts = DEFAULT_MAX_ATTEMPTS,
	retryDelayMs = DEFAULT_RETRY_DELAY_MS,
	logger = silentLogger,
}: MutationServiceConfig) {
	const emitter = mitt<MutationEvents>();

	// Listener failures are logged; they never change a mutation's outcome.
	const notify = <K extends keyof MutationEvents>(
		event: K,
		payload: MutationEvents[K],
	) => {
		try {
			emitter.emit(event, payload);
		} catch (error) {
			logger.error(`"${event}" listener failed`, error);
		}
	};

	async function run(
		session: SessionContext,
		operation: OperationKind,
		build: () => Transformation,
		afterCommit?: (committed: Committed) => Promise<string | undefined>,
	): Promise<MutationOutcome> {
		let committed: Committed;
		try {
			committed = await runOptimisticMutation(
				{
					state: driver.state,
					clock,
					sleep,
					random,
					maxAttempts,
					retryDelayMs,
					onConflict: (attempt, path) =>
						notify("conflict", {
							operation,
							sessionId: session.id,
							attempt,
							path,
						}),
				},
				session,
				build(),
			);
		} catch (error) {
			if (error instanceof DashboardError) {
				notify("rejected", { operation, sessionId: session.id, error });
				return {
					ok: false,
					message: error.message,
					reason: failureReasonOf(error),
				};
			}
			logger.error("unexpected failure during mutation", error);
			return {
				ok: false,
				message: `Store error: ${describeError(error)}`,
				reason: "unavailable",
			};
		}

		const warning = afterCommit ? await afterCommit(committed) : undefined;
		const message = `${committed.result.summary} (${pathNote(committed)}).`;

		notify("committed", {
			operation,
			sessionId: session.id,
			record: cloneRecord(committed.record),
			attempts: committed.attempts,
			path: committed.path,
		});

		return {
			ok: true,
			message: warning ? `${message} Warning: ${warning}` : message,
			record: cloneRecord(committed.record),
			attempts: committed.attempts,
			path: committed.path,
			...(warning ? { warning } : {}),
		};
	}

	async function recordSubtraction(
		session: SessionContext,
		committed: Committed,
		amount: number,
		note: string,
	): Promise<string | undefined> {
		try {
			const entry: TransactionLogEntry = {
				txId: await driver.counter.next(),
				timestamp: committed.record.baselineTimestamp,
				entryName: committed.result.entryName,
				deltaAmount: -amount,
				note,
				actor: session.actor,
			};
			await driver.log.append(entry);
			return undefined;
		} catch (cause) {
			const error = new LogWriteFailedError(cause);
			logger.warn(error.message);
			notify("logFailed", { sessionId: session.id, error });
			return error.message;
		}
	}

	return {
		async snapshot(session: SessionContext): Promise<Snapshot> {
			const record = await readRecord(driver.state);
			session.cache = cloneRecord(record);
			const readAt = clock.now();
			return { record, values: projectRecord(record, readAt), readAt };
		},

		subtract(session: SessionContext, request: SubtractRequest) {
			return run(
				session,
				"subtract",
				() =>
					subtractTransform(request.index, request.amount, request.expectedName),
				(committed) =>
					recordSubtraction(session, committed, request.amount, request.note ?? ""),
			);
		},

		addEntry(session: SessionContext, request: AddEntryRequest) {
			return run(session, "add-entry", () =>
				addEntryTransform(request.name, request.startValue, request.rate),
			);
		},

		editEntry(session: SessionContext, request: EditEntryRequest) {
			return run(session, "edit-entry", () =>
				editEntryTransform(
					request.index,
					request.name,
					request.currentValue,
					request.rate,
					request.expectedName,
				),
			);
		},

		deleteEntry(session: SessionContext, request: DeleteEntryRequest) {
			return run(session, "delete-entry", () =>
				deleteEntryTransform(request.index, request.expectedName),
			);
		},

		listRecent(limit: number) {
			return driver.log.listRecent(limit);
		},

		on<K extends keyof MutationEvents>(
			event: K,
			handler: (payload: MutationEvents[K]) => void,
		) {
			emitter.on(event, handler);
			return () => emitter.off(event, handler);
		},

		dispose() {
			emitter.all.clear();
		},
	};
}
