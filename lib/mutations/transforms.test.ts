import { expect, test } from "vitest";
import { ValidationError } from "../errors";
import type { EntryVectors } from "../types";
import {
	addEntryTransform,
	deleteEntryTransform,
	editEntryTransform,
	subtractTransform,
} from "./transforms";

const vectors = (): EntryVectors => ({
	names: ["A", "B", "C"],
	values: [1, 2, 3],
	rates: [0.1, 0.2, 0.3],
});

test("subtract lowers only the target value", () => {
	const { vectors: next, entryName, summary } = subtractTransform(1, 0.5).apply(
		vectors(),
	);

	expect(next).toEqual({
		names: ["A", "B", "C"],
		values: [1, 1.5, 3],
		rates: [0.1, 0.2, 0.3],
	});
	expect(entryName).toBe("B");
	expect(summary).toBe("Subtracted 0.5 from B");
});

test("subtract accepts a negative amount", () => {
	const { vectors: next } = subtractTransform(0, -2).apply(vectors());

	expect(next.values).toEqual([3, 2, 3]);
});

test("subtract rejects a zero amount before touching any state", () => {
	expect(() => subtractTransform(0, 0)).toThrow(ValidationError);
	expect(() => subtractTransform(0, 0)).toThrow(
		"Enter a non-zero amount to subtract.",
	);
});

test("subtract rejects non-finite amounts and malformed indexes", () => {
	expect(() => subtractTransform(0, Number.NaN)).toThrow(
		"Amount must be a finite number.",
	);
	expect(() => subtractTransform(-1, 1)).toThrow(
		"Index must be a non-negative integer.",
	);
	expect(() => subtractTransform(1.5, 1)).toThrow(
		"Index must be a non-negative integer.",
	);
});

test("subtract rejects an index past the end of the candidate", () => {
	const transform = subtractTransform(3, 1);

	expect(() => transform.apply(vectors())).toThrow(
		"Index 3 is out of range (3 entries).",
	);
});

test("subtract with an expected name refuses a shifted position", () => {
	expect(subtractTransform(2, 1, "C").apply(vectors()).entryName).toBe("C");
	expect(() => subtractTransform(1, 1, "C").apply(vectors())).toThrow(
		'Entry at index 1 is now "B", not "C".',
	);
});

test("subtract may start from the session cache; other operations may not", () => {
	expect(subtractTransform(0, 1).allowCached).toBe(true);
	expect(addEntryTransform("D", 0, 1).allowCached).toBe(false);
	expect(editEntryTransform(0, "A", 0, 1).allowCached).toBe(false);
	expect(deleteEntryTransform(0).allowCached).toBe(false);
});

test("addEntry appends to all three vectors and keeps existing values", () => {
	const { vectors: next, summary } = addEntryTransform("  D ", 4, 0.4).apply(
		vectors(),
	);

	expect(next).toEqual({
		names: ["A", "B", "C", "D"],
		values: [1, 2, 3, 4],
		rates: [0.1, 0.2, 0.3, 0.4],
	});
	expect(summary).toBe("Added entry D");
});

test("addEntry rejects blank and duplicate names", () => {
	expect(() => addEntryTransform("   ", 0, 1)).toThrow("Name must not be empty.");
	expect(() => addEntryTransform("B", 0, 1).apply(vectors())).toThrow(
		'An entry named "B" already exists.',
	);
});

test("editEntry replaces name, value and rate at the index only", () => {
	const { vectors: next, entryName, summary } = editEntryTransform(
		1,
		"Beta",
		9,
		-1,
	).apply(vectors());

	expect(next).toEqual({
		names: ["A", "Beta", "C"],
		values: [1, 9, 3],
		rates: [0.1, -1, 0.3],
	});
	expect(entryName).toBe("B");
	expect(summary).toBe("Updated entry B, renamed to Beta");
});

test("editEntry may keep the entry's own name", () => {
	const { vectors: next, summary } = editEntryTransform(0, "A", 5, 0.5).apply(
		vectors(),
	);

	expect(next.names).toEqual(["A", "B", "C"]);
	expect(next.values).toEqual([5, 2, 3]);
	expect(summary).toBe("Updated entry A");
});

test("editEntry rejects a name held by another entry", () => {
	expect(() => editEntryTransform(0, "C", 0, 1).apply(vectors())).toThrow(
		'An entry named "C" already exists.',
	);
});

test("editEntry rejects when the entry at the index is not the expected one", () => {
	expect(() =>
		editEntryTransform(1, "X", 0, 1, "A").apply(vectors()),
	).toThrow('Entry at index 1 is now "B", not "A".');
});

test("deleteEntry removes the position from all three vectors", () => {
	const { vectors: next, summary } = deleteEntryTransform(1).apply(vectors());

	expect(next).toEqual({
		names: ["A", "C"],
		values: [1, 3],
		rates: [0.1, 0.3],
	});
	expect(summary).toBe("Deleted entry B");
});

test("deleteEntry rejects an out-of-range index and an unexpected name", () => {
	expect(() => deleteEntryTransform(5).apply(vectors())).toThrow(
		"Index 5 is out of range (3 entries).",
	);
	expect(() => deleteEntryTransform(0, "B").apply(vectors())).toThrow(
		'Entry at index 0 is now "A", not "B".',
	);
});

test("transforms never mutate the projected vectors they are given", () => {
	const input = vectors();

	subtractTransform(0, 1).apply(input);
	addEntryTransform("D", 0, 0).apply(input);
	editEntryTransform(0, "Z", 0, 0).apply(input);
	deleteEntryTransform(0).apply(input);

	expect(input).toEqual(vectors());
});
