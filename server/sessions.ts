import { createSession, type SessionContext } from "../lib/session";

export const SESSION_COOKIE = "session_id";

const SESSION_ID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

export type SessionRegistry = ReturnType<typeof createSessionRegistry>;

/**
 * Bounded map of live session contexts. Once full, the least recently
 * resolved session is evicted; its next request simply starts a new one.
 */
export function createSessionRegistry({
	maxSessions = 1000,
}: { maxSessions?: number } = {}) {
	const sessions = new Map<string, SessionContext>();

	const touch = (session: SessionContext) => {
		sessions.delete(session.id);
		sessions.set(session.id, session);
		while (sessions.size > maxSessions) {
			const oldest = sessions.keys().next();
			if (oldest.done) break;
			sessions.delete(oldest.value);
		}
		return session;
	};

	return {
		/**
		 * Return the session for `id`, creating one (under `id` when it is a
		 * well-formed ULID) if none is live.
		 */
		resolve(id: string | undefined, actor: string): SessionContext {
			const existing = id ? sessions.get(id) : undefined;
			const session =
				existing ??
				createSession(id && SESSION_ID_PATTERN.test(id) ? { id } : {});
			session.actor = actor;
			return touch(session);
		},
		get(id: string) {
			return sessions.get(id);
		},
		get size() {
			return sessions.size;
		},
	};
}
