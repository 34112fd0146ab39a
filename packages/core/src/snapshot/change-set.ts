import type { RawRecord, Snapshot } from "../types/record-types.js";
import { isPlainRecord } from "./snapshot.js";

/**
 * Strict equality at the leaves, structural for arrays and plain records.
 * No coercion: 1 and "1" differ, as do null and undefined.
 */
export const isIdentical = (left: unknown, right: unknown): boolean => {
	if (left === right) {
		return true;
	}
	if (Array.isArray(left) && Array.isArray(right)) {
		return (
			left.length === right.length &&
			left.every((item, index) => isIdentical(item, right[index]))
		);
	}
	if (isPlainRecord(left) && isPlainRecord(right)) {
		const leftKeys = Object.keys(left);
		return (
			leftKeys.length === Object.keys(right).length &&
			leftKeys.every(
				(key) => key in right && isIdentical(left[key], right[key]),
			)
		);
	}
	return false;
};

/**
 * Fields of `snapshot` that are new relative to `original` or whose value
 * is not identical to the original one.
 */
export const computeChangeSet = (
	snapshot: Snapshot,
	original: RawRecord,
): Snapshot => {
	const changes: Record<string, unknown> = {};
	for (const [field, value] of Object.entries(snapshot)) {
		if (!(field in original) || !isIdentical(original[field], value)) {
			changes[field] = value;
		}
	}
	return changes;
};
