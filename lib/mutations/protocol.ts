import { type Clock, stampAfter } from "../clock";
import type { StateStore } from "../drivers/types";
import {
	ConflictExhaustedError,
	StoreUnavailableError,
	ValidationError,
} from "../errors";
import { projectRecord } from "../projection";
import type { SessionContext } from "../session";
import {
	type CommitPath,
	cloneRecord,
	type EntryVectors,
	type StateRecord,
} from "../types";
import type { Transformation, TransformResult } from "./transforms";

export const DEFAULT_MAX_ATTEMPTS = 8;
export const DEFAULT_RETRY_DELAY_MS = 50;

export type ProtocolOptions = {
	state: StateStore;
	clock: Clock;
	sleep: (ms: number) => Promise<void>;
	/** Source of jitter in [0, 1). */
	random: () => number;
	maxAttempts: number;
	retryDelayMs: number;
	onConflict?: (attempt: number, path: CommitPath) => void;
};

export type Committed = {
	record: StateRecord;
	result: TransformResult;
	attempts: number;
	path: CommitPath;
};

export const sleep = (ms: number) =>
	new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Uniform in [delay / 2, 3 * delay / 2). */
export const jitteredDelay = (delayMs: number, random: () => number) =>
	delayMs * (0.5 + random());

export async function readRecord(state: StateStore): Promise<StateRecord> {
	let record: StateRecord | null;
	try {
		record = await state.read();
	} catch (error) {
		throw new StoreUnavailableError("State record could not be read.", error);
	}
	if (!record) {
		throw new StoreUnavailableError("State record is missing.");
	}
	return record;
}

const assertAligned = (vectors: EntryVectors) => {
	const { names, values, rates } = vectors;
	if (names.length !== values.length || names.length !== rates.length) {
		throw new Error(
			`Entry vectors out of step: ${names.length} names, ${values.length} values, ${rates.length} rates.`,
		);
	}
	if (new Set(names).size !== names.length) {
		throw new Error("Entry names are not unique.");
	}
};

/** A value or rate that overflowed cannot be stored or projected again. */
const assertFiniteResult = ({ names, values, rates }: EntryVectors) => {
	names.forEach((name, i) => {
		if (!Number.isFinite(values[i]) || !Number.isFinite(rates[i])) {
			throw new ValidationError(
				`Value of ${name} would no longer be a finite number.`,
			);
		}
	});
};

/**
 * Run one transformation against the shared record with optimistic
 * concurrency.
 *
 * @remarks
 * - Each attempt projects the candidate to a fresh stamp, applies the
 *   transformation and writes conditionally on the candidate's timestamp.
 * - Every commit re-bases the whole record, so the baseline timestamp alone
 *   is a sufficient version token.
 * - A lost race re-reads the authoritative record and retries after a
 *   jittered pause, up to `maxAttempts` attempts in total.
 * - A validation rejection from a cached candidate is re-checked once
 *   against a fresh read before it is reported.
 *
 * @throws {ValidationError} the candidate rules the operation out, or a
 *   resulting value is not finite
 * @throws {ConflictExhaustedError} every attempt lost its race
 * @throws {StoreUnavailableError} the record could not be read
 */
export async function runOptimisticMutation(
	options: ProtocolOptions,
	session: SessionContext,
	transformation: Transformation,
): Promise<Committed> {
	const { state, clock, maxAttempts } = options;

	let path: CommitPath;
	let candidate: StateRecord;
	if (transformation.allowCached && session.cache) {
		path = "cached";
		candidate = session.cache;
	} else {
		path = "fresh";
		candidate = await readRecord(state);
		session.cache = cloneRecord(candidate);
	}

	let attempts = 0;
	for (;;) {
		const at = stampAfter(clock, candidate.baselineTimestamp);

		let result: TransformResult;
		try {
			result = transformation.apply({
				names: [...candidate.names],
				values: projectRecord(candidate, at),
				rates: [...candidate.rates],
			});
			assertFiniteResult(result.vectors);
		} catch (error) {
			if (error instanceof ValidationError && path === "cached") {
				path = "fresh";
				candidate = await readRecord(state);
				session.cache = cloneRecord(candidate);
				continue;
			}
			throw error;
		}

		assertAligned(result.vectors);
		attempts += 1;

		const record: StateRecord = {
			names: result.vectors.names,
			baselineValues: result.vectors.values,
			rates: result.vectors.rates,
			baselineTimestamp: at,
		};

		if (await state.conditionalWrite(candidate.baselineTimestamp, record)) {
			session.cache = cloneRecord(record);
			return { record, result, attempts, path };
		}

		options.onConflict?.(attempts, path);
		if (attempts >= maxAttempts) {
			throw new ConflictExhaustedError(transformation.operation, attempts);
		}

		await options.sleep(jitteredDelay(options.retryDelayMs, options.random));
		path = "fresh";
		candidate = await readRecord(state);
		session.cache = cloneRecord(candidate);
	}
}
