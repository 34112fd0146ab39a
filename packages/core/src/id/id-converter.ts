/**
 * Identifier converters translate identifiers between their in-memory form
 * and the form a storage driver is called with, and clean identifier
 * artefacts out of records read back from storage.
 *
 * `unserialize` always returns a new record; the caller's data is left as is.
 */

import { Predicate } from "effect";
import type { ClassMetadata } from "../mapping/class-metadata.js";
import type { RawRecord } from "../types/record-types.js";
import { type Identifier, isCompositeIdentifier } from "./identifier.js";

export interface IdConverter {
	readonly serialize: (metadata: ClassMetadata, id: Identifier) => Identifier;
	readonly unserialize: (metadata: ClassMetadata, data: RawRecord) => RawRecord;
}

// ============================================================================
// Passthrough
// ============================================================================

export const passthroughIdConverter: IdConverter = {
	serialize: (_metadata, id) => id,
	unserialize: (_metadata, data) => ({ ...data }),
};

// ============================================================================
// Encoded key
// ============================================================================

export interface EncodedKeyConverterConfig {
	/** Record field a driver stores the encoded key under. */
	readonly keyField?: string;
	readonly separator?: string;
}

const defaultEncodedKeyConfig: Required<EncodedKeyConverterConfig> = {
	keyField: "_key",
	separator: "|",
};

/**
 * Encodes every identifier as one string key, for backends addressed by a
 * single string. Composite parts are URI-component encoded and joined in
 * declared field order.
 *
 * On the way back the key field is dropped from the record and any
 * identifier field the record lacks is restored from it, as a string.
 */
export const makeEncodedKeyConverter = (
	config: EncodedKeyConverterConfig = {},
): IdConverter => {
	const { keyField, separator } = { ...defaultEncodedKeyConfig, ...config };

	const serialize = (_metadata: ClassMetadata, id: Identifier): Identifier =>
		isCompositeIdentifier(id)
			? Object.values(id)
					.map((value) => encodeURIComponent(String(value)))
					.join(separator)
			: String(id);

	const unserialize = (metadata: ClassMetadata, data: RawRecord): RawRecord => {
		const rest: Record<string, unknown> = { ...data };
		const encoded = rest[keyField];
		delete rest[keyField];
		if (!Predicate.isString(encoded)) {
			return rest;
		}
		const parts = metadata.isCompositeKey
			? encoded.split(separator).map((part) => decodeURIComponent(part))
			: [encoded];
		metadata.identifier.forEach((field, index) => {
			const part = parts[index];
			if (!(field in rest) && part !== undefined) {
				rest[field] = part;
			}
		});
		return rest;
	};

	return { serialize, unserialize };
};
