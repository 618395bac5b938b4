import type { FailureReason, OperationKind } from "./types";

export type DashboardErrorCode =
	| "validation"
	| "conflict_exhausted"
	| "store_unavailable"
	| "log_write_failed";

export class DashboardError extends Error {
	constructor(
		public readonly code: DashboardErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "DashboardError";

		// Maintains proper stack trace for where our error was thrown (only available on V8)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

export class ValidationError extends DashboardError {
	constructor(message: string) {
		super("validation", message);
		this.name = "ValidationError";
	}
}

export class ConflictExhaustedError extends DashboardError {
	public readonly operation: OperationKind;
	public readonly attempts: number;

	constructor(operation: OperationKind, attempts: number) {
		super(
			"conflict_exhausted",
			`Failed to update after ${attempts} attempts; please try again.`,
		);
		this.name = "ConflictExhaustedError";
		this.operation = operation;
		this.attempts = attempts;
	}
}

export class StoreUnavailableError extends DashboardError {
	constructor(message = "State record is unavailable.", cause?: unknown) {
		super("store_unavailable", message, { cause });
		this.name = "StoreUnavailableError";
	}
}

export class LogWriteFailedError extends DashboardError {
	constructor(cause: unknown) {
		super(
			"log_write_failed",
			`Failed to record transaction log entry: ${describeError(cause)}`,
			{ cause },
		);
		this.name = "LogWriteFailedError";
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export const failureReasonOf = (error: DashboardError): FailureReason => {
	switch (error.code) {
		case "validation":
			return "validation";
		case "conflict_exhausted":
			return "conflict";
		case "store_unavailable":
		case "log_write_failed":
			return "unavailable";
	}
};
