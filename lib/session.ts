import { ulid } from "ulid";
import type { StateRecord } from "./types";

/**
 * Per-session context passed explicitly to every service call. The cache
 * is private to the session and may be stale; the mutation protocol
 * tolerates that instead of preventing it.
 */
export type SessionContext = {
	readonly id: string;
	actor: string;
	/** Last record this session observed or wrote. */
	cache: StateRecord | null;
};

export function createSession({
	id = ulid(),
	actor = "",
}: { id?: string; actor?: string } = {}): SessionContext {
	return { id, actor, cache: null };
}
