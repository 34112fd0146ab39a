/**
 * Snapshot engine: the flat field-to-value state of an instance, used for
 * change detection and as the payload of inserts.
 *
 * Declared fields come first (identifier and transient fields excluded,
 * embedded fields recursed into), then any extra attributes the mapping
 * does not name. Reads only; tracking state is never touched.
 */

import { Effect, Predicate } from "effect";
import type { MappingError } from "../errors/mapping-errors.js";
import {
	type ClassMetadata,
	isMappedField,
	readField,
} from "../mapping/class-metadata.js";
import type { MetadataRegistryShape } from "../mapping/metadata-registry.js";
import type { RawRecord, Snapshot } from "../types/record-types.js";

// ============================================================================
// Value copies
// ============================================================================

export const isPlainRecord = (
	value: unknown,
): value is Readonly<Record<string, unknown>> => {
	if (!Predicate.isRecord(value)) {
		return false;
	}
	const prototype: unknown = Object.getPrototypeOf(value);
	return prototype === Object.prototype || prototype === null;
};

/**
 * Arrays and plain records are copied so that in-place mutation of the live
 * instance still shows up as a difference. Anything else is kept by reference.
 */
export const copyValue = (value: unknown): unknown => {
	if (Array.isArray(value)) {
		return value.map(copyValue);
	}
	if (isPlainRecord(value)) {
		return Object.fromEntries(
			Object.entries(value).map(([key, nested]) => [key, copyValue(nested)]),
		);
	}
	return value;
};

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Snapshot an instance of `metadata`. A missing embedded instance
 * (null or undefined) snapshots to an empty record. Undefined values are
 * left out.
 */
export const takeSnapshot = (
	registry: MetadataRegistryShape,
	metadata: ClassMetadata,
	instance: unknown,
): Effect.Effect<Snapshot, MappingError> =>
	Effect.gen(function* () {
		const data: Record<string, unknown> = {};
		if (!Predicate.isObject(instance)) {
			return data;
		}

		for (const [field, mapping] of metadata.fields) {
			if (mapping._tag === "Transient") {
				continue;
			}
			const value = readField(instance, field);
			if (mapping._tag === "Embedded") {
				const target = yield* registry.getMetadataFor(mapping.target);
				data[field] = yield* takeSnapshot(registry, target, value);
				continue;
			}
			if (value !== undefined) {
				data[field] = copyValue(value);
			}
		}

		// Extra attributes never overwrite a declared field
		for (const [field, value] of Object.entries(instance)) {
			if (isMappedField(metadata, field) || field in data) {
				continue;
			}
			if (value !== undefined) {
				data[field] = copyValue(value);
			}
		}

		return data;
	});

/**
 * Stored data in the shape a snapshot of its hydrated instance takes:
 * embedded fields that are absent or null read as an empty record, at every
 * depth. Other fields are left as they are.
 */
export const alignEmbedded = (
	registry: MetadataRegistryShape,
	metadata: ClassMetadata,
	data: RawRecord,
): Effect.Effect<RawRecord, MappingError> =>
	Effect.gen(function* () {
		const aligned: Record<string, unknown> = { ...data };
		for (const [field, mapping] of metadata.fields) {
			if (mapping._tag !== "Embedded") {
				continue;
			}
			const value = data[field];
			if (value === undefined || value === null) {
				aligned[field] = {};
			} else if (isPlainRecord(value)) {
				const target = yield* registry.getMetadataFor(mapping.target);
				aligned[field] = yield* alignEmbedded(registry, target, value);
			}
		}
		return aligned;
	});
