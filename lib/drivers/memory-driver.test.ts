import { expect, test } from "vitest";
import { createManualClock, makeRecord, T0 } from "../test-helpers";
import { createMemoryDriver } from "./memory-driver";

const defaults = { names: ["A", "B"], values: [1, 2], rates: [0.5, -0.5] };

test("ensureInitialized creates the record stamped now", async () => {
	const driver = createMemoryDriver({ clock: createManualClock(T0) });

	expect(await driver.state.read()).toBeNull();
	const record = await driver.state.ensureInitialized(defaults);

	expect(record).toEqual({
		names: ["A", "B"],
		baselineValues: [1, 2],
		rates: [0.5, -0.5],
		baselineTimestamp: T0,
	});
	expect(await driver.state.read()).toEqual(record);
});

test("ensureInitialized leaves an existing record unchanged", async () => {
	const driver = createMemoryDriver({ initial: makeRecord() });

	const record = await driver.state.ensureInitialized(defaults);

	expect(record).toEqual(makeRecord());
});

test("concurrent first access creates exactly one record", async () => {
	const driver = createMemoryDriver({ clock: createManualClock(T0) });

	const [first, second] = await Promise.all([
		driver.state.ensureInitialized(defaults),
		driver.state.ensureInitialized({ ...defaults, names: ["X", "Y"] }),
	]);

	expect(second).toEqual(first);
	expect(first.names).toEqual(["A", "B"]);
});

test("conditionalWrite succeeds only against the current timestamp", async () => {
	const driver = createMemoryDriver({ initial: makeRecord() });
	const next = makeRecord({ baselineValues: [1, 1, 1], baselineTimestamp: T0 + 10 });

	expect(await driver.state.conditionalWrite(T0 - 1, next)).toBe(false);
	expect(await driver.state.conditionalWrite(T0, next)).toBe(true);
	expect(await driver.state.conditionalWrite(T0, next)).toBe(false);
	expect(await driver.state.read()).toEqual(next);
});

test("two writers holding the same token: exactly one wins", async () => {
	const driver = createMemoryDriver({ initial: makeRecord() });

	const results = await Promise.all([
		driver.state.conditionalWrite(T0, makeRecord({ baselineTimestamp: T0 + 1 })),
		driver.state.conditionalWrite(T0, makeRecord({ baselineTimestamp: T0 + 2 })),
	]);

	expect(results).toEqual([true, false]);
});

test("conditionalWrite fails when no record exists", async () => {
	const driver = createMemoryDriver();

	expect(await driver.state.conditionalWrite(T0, makeRecord())).toBe(false);
});

test("records handed out are copies", async () => {
	const driver = createMemoryDriver({ initial: makeRecord() });

	const read = await driver.state.read();
	read?.names.push("Z");

	expect((await driver.state.read())?.names).toEqual(["A", "B", "C"]);
});

test("counter returns distinct increasing values", async () => {
	const driver = createMemoryDriver();

	const ids = await Promise.all(Array.from({ length: 20 }, () => driver.counter.next()));

	expect(new Set(ids).size).toBe(20);
	expect([...ids].sort((a, b) => a - b)).toEqual(
		Array.from({ length: 20 }, (_, i) => i + 1),
	);
});

test("listRecent orders by timestamp then txId, newest first", async () => {
	const driver = createMemoryDriver();
	const entry = { entryName: "A", deltaAmount: -1, note: "", actor: "" };

	await driver.log.append({ ...entry, txId: 1, timestamp: T0 });
	await driver.log.append({ ...entry, txId: 3, timestamp: T0 + 5 });
	await driver.log.append({ ...entry, txId: 2, timestamp: T0 + 5 });
	await driver.log.append({ ...entry, txId: 4, timestamp: T0 + 1 });

	const recent = await driver.log.listRecent(3);

	expect(recent.map((e) => e.txId)).toEqual([3, 2, 4]);
});
