import { ValidationError } from "../errors";
import type { EntryVectors, OperationKind } from "../types";

export type TransformResult = {
	vectors: EntryVectors;
	/** Name of the entry the operation targeted, as it stood before the change. */
	entryName: string;
	summary: string;
};

/**
 * One row of the mutation table: which operation it is and how it rewrites
 * the projected vectors. Constructors validate everything that needs no
 * state up front; `apply` checks the rest against each candidate and throws
 * {@link ValidationError} when the candidate rules the operation out.
 */
export type Transformation = {
	operation: OperationKind;
	/** Whether the session's cached record may serve as the first candidate. */
	allowCached: boolean;
	apply(projected: EntryVectors): TransformResult;
};

const assertFinite = (value: number, label: string) => {
	if (!Number.isFinite(value)) {
		throw new ValidationError(`${label} must be a finite number.`);
	}
};

const assertIndexShape = (index: number) => {
	if (!Number.isInteger(index) || index < 0) {
		throw new ValidationError("Index must be a non-negative integer.");
	}
};

const normalizeName = (name: string) => {
	const trimmed = name.trim();
	if (trimmed.length === 0) {
		throw new ValidationError("Name must not be empty.");
	}
	return trimmed;
};

const entryAt = (
	vectors: EntryVectors,
	index: number,
	expectedName?: string,
): string => {
	const name = vectors.names[index];
	if (name === undefined) {
		throw new ValidationError(
			`Index ${index} is out of range (${vectors.names.length} entries).`,
		);
	}
	if (expectedName !== undefined && name !== expectedName) {
		throw new ValidationError(
			`Entry at index ${index} is now "${name}", not "${expectedName}".`,
		);
	}
	return name;
};

const copy = (vectors: EntryVectors): EntryVectors => ({
	names: [...vectors.names],
	values: [...vectors.values],
	rates: [...vectors.rates],
});

export function subtractTransform(
	index: number,
	amount: number,
	expectedName?: string,
): Transformation {
	assertIndexShape(index);
	assertFinite(amount, "Amount");
	if (amount === 0) {
		throw new ValidationError("Enter a non-zero amount to subtract.");
	}

	return {
		operation: "subtract",
		allowCached: true,
		apply(projected) {
			const entryName = entryAt(projected, index, expectedName);
			const vectors = copy(projected);
			vectors.values[index] = (vectors.values[index] ?? 0) - amount;
			return {
				vectors,
				entryName,
				summary: `Subtracted ${amount} from ${entryName}`,
			};
		},
	};
}

export function addEntryTransform(
	name: string,
	startValue: number,
	rate: number,
): Transformation {
	const entryName = normalizeName(name);
	assertFinite(startValue, "Start value");
	assertFinite(rate, "Rate");

	return {
		operation: "add-entry",
		allowCached: false,
		apply(projected) {
			if (projected.names.includes(entryName)) {
				throw new ValidationError(`An entry named "${entryName}" already exists.`);
			}
			const vectors = copy(projected);
			vectors.names.push(entryName);
			vectors.values.push(startValue);
			vectors.rates.push(rate);
			return { vectors, entryName, summary: `Added entry ${entryName}` };
		},
	};
}

export function editEntryTransform(
	index: number,
	name: string,
	currentValue: number,
	rate: number,
	expectedName?: string,
): Transformation {
	assertIndexShape(index);
	const newName = normalizeName(name);
	assertFinite(currentValue, "Current value");
	assertFinite(rate, "Rate");

	return {
		operation: "edit-entry",
		allowCached: false,
		apply(projected) {
			const entryName = entryAt(projected, index, expectedName);
			const existing = projected.names.indexOf(newName);
			if (existing !== -1 && existing !== index) {
				throw new ValidationError(`An entry named "${newName}" already exists.`);
			}
			const vectors = copy(projected);
			vectors.names[index] = newName;
			vectors.values[index] = currentValue;
			vectors.rates[index] = rate;
			return {
				vectors,
				entryName,
				summary:
					entryName === newName
						? `Updated entry ${newName}`
						: `Updated entry ${entryName}, renamed to ${newName}`,
			};
		},
	};
}

export function deleteEntryTransform(
	index: number,
	expectedName?: string,
): Transformation {
	assertIndexShape(index);

	return {
		operation: "delete-entry",
		allowCached: false,
		apply(projected) {
			const entryName = entryAt(projected, index, expectedName);
			const vectors = copy(projected);
			vectors.names.splice(index, 1);
			vectors.values.splice(index, 1);
			vectors.rates.splice(index, 1);
			return { vectors, entryName, summary: `Deleted entry ${entryName}` };
		},
	};
}
