import { expect, test } from "vitest";
import { createSessionRegistry } from "./sessions";

const VALID_ID = "01J9Z3K4M5N6P7Q8R9S0T1V2W3";

test("resolve creates a session and returns the same one for its id", () => {
	const sessions = createSessionRegistry();

	const first = sessions.resolve(undefined, "alice");
	const again = sessions.resolve(first.id, "alice");

	expect(again).toBe(first);
	expect(first.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
	expect(first.cache).toBeNull();
});

test("resolve keeps a well-formed unknown id and replaces a malformed one", () => {
	const sessions = createSessionRegistry();

	expect(sessions.resolve(VALID_ID, "").id).toBe(VALID_ID);
	expect(sessions.resolve("not-a-ulid", "").id).not.toBe("not-a-ulid");
});

test("resolve updates the actor on every request", () => {
	const sessions = createSessionRegistry();
	const session = sessions.resolve(undefined, "alice");

	sessions.resolve(session.id, "bob");

	expect(session.actor).toBe("bob");
});

test("the least recently used session is evicted when full", () => {
	const sessions = createSessionRegistry({ maxSessions: 2 });
	const a = sessions.resolve(undefined, "a");
	const b = sessions.resolve(undefined, "b");

	sessions.resolve(a.id, "a");
	const c = sessions.resolve(undefined, "c");

	expect(sessions.size).toBe(2);
	expect(sessions.get(a.id)).toBe(a);
	expect(sessions.get(b.id)).toBeUndefined();
	expect(sessions.get(c.id)).toBe(c);
});
