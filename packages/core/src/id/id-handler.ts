/**
 * Identifier handlers hide whether a class is keyed by one field or by
 * several, so the unit of work never inspects identifier shapes itself.
 *
 * The variant is chosen once per unit of work from the storage driver's
 * `supportsCompositePrimaryKeys` flag. Classes with a single identifier
 * field always use scalar identifiers, whichever variant is active.
 */

import { Effect, Option, Predicate } from "effect";
import { InvalidIdentifierError } from "../errors/unit-of-work-errors.js";
import { type ClassMetadata, readField } from "../mapping/class-metadata.js";
import {
	type CompositeIdentifier,
	hashIdentifier,
	type Identifier,
	type IdentifierValue,
	isIdentifierValue,
	type RawKey,
} from "./identifier.js";

// ============================================================================
// Types
// ============================================================================

export interface IdHandler {
	/** Whether identifiers of this class can be handled at all. */
	readonly supports: (metadata: ClassMetadata) => boolean;
	/**
	 * Canonical identifier for a caller-supplied key, restricted to the
	 * declared identifier fields.
	 */
	readonly normalizeId: (
		metadata: ClassMetadata,
		key: RawKey,
	) => Effect.Effect<Identifier, InvalidIdentifierError>;
	/** Identifier read off a live instance; None while any part is unset. */
	readonly getIdentifier: (
		metadata: ClassMetadata,
		instance: object,
	) => Option.Option<Identifier>;
	readonly hash: (id: Identifier) => string;
}

// ============================================================================
// Shared
// ============================================================================

const invalid = (
	metadata: ClassMetadata,
	message: string,
	field?: string,
): InvalidIdentifierError =>
	new InvalidIdentifierError({ entity: metadata.name, field, message });

const normalizeScalar = (
	metadata: ClassMetadata,
	key: RawKey,
): Effect.Effect<IdentifierValue, InvalidIdentifierError> => {
	const [field] = metadata.identifier;
	if (field === undefined) {
		return Effect.fail(invalid(metadata, `'${metadata.name}' declares no identifier`));
	}
	const value = Predicate.isRecord(key) ? key[field] : key;
	return isIdentifierValue(value)
		? Effect.succeed(value)
		: Effect.fail(
				invalid(
					metadata,
					`Missing value for identifier field '${field}' of '${metadata.name}'`,
					field,
				),
			);
};

const getScalarIdentifier = (
	metadata: ClassMetadata,
	instance: object,
): Option.Option<Identifier> => {
	const [field] = metadata.identifier;
	if (field === undefined) {
		return Option.none();
	}
	const value = readField(instance, field);
	return isIdentifierValue(value) ? Option.some(value) : Option.none();
};

// ============================================================================
// Single-field handler
// ============================================================================

/**
 * For drivers without composite key support. Composite classes are rejected.
 */
export const singleIdHandler: IdHandler = {
	supports: (metadata) => !metadata.isCompositeKey,

	normalizeId: (metadata, key) =>
		metadata.isCompositeKey
			? Effect.fail(
					invalid(
						metadata,
						`'${metadata.name}' has a composite identifier, which the storage driver does not support`,
					),
				)
			: normalizeScalar(metadata, key),

	getIdentifier: (metadata, instance) =>
		metadata.isCompositeKey
			? Option.none()
			: getScalarIdentifier(metadata, instance),

	hash: hashIdentifier,
};

// ============================================================================
// Composite handler
// ============================================================================

const normalizeComposite = (
	metadata: ClassMetadata,
	key: RawKey,
): Effect.Effect<CompositeIdentifier, InvalidIdentifierError> =>
	Effect.suspend(() => {
		if (!Predicate.isRecord(key)) {
			return Effect.fail(
				invalid(
					metadata,
					`'${metadata.name}' has a composite identifier (${metadata.identifier.join(", ")}); a scalar key cannot address it`,
				),
			);
		}
		const id: Record<string, IdentifierValue> = {};
		for (const field of metadata.identifier) {
			const value = key[field];
			if (!isIdentifierValue(value)) {
				return Effect.fail(
					invalid(
						metadata,
						`Missing value for identifier field '${field}' of '${metadata.name}'`,
						field,
					),
				);
			}
			id[field] = value;
		}
		return Effect.succeed(id);
	});

const getCompositeIdentifier = (
	metadata: ClassMetadata,
	instance: object,
): Option.Option<Identifier> => {
	const id: Record<string, IdentifierValue> = {};
	for (const field of metadata.identifier) {
		const value = readField(instance, field);
		if (!isIdentifierValue(value)) {
			return Option.none();
		}
		id[field] = value;
	}
	return Option.some(id);
};

export const compositeIdHandler: IdHandler = {
	supports: () => true,

	normalizeId: (metadata, key) =>
		metadata.isCompositeKey
			? normalizeComposite(metadata, key)
			: normalizeScalar(metadata, key),

	getIdentifier: (metadata, instance) =>
		metadata.isCompositeKey
			? getCompositeIdentifier(metadata, instance)
			: getScalarIdentifier(metadata, instance),

	hash: hashIdentifier,
};

export const selectIdHandler = (
	supportsCompositePrimaryKeys: boolean,
): IdHandler =>
	supportsCompositePrimaryKeys ? compositeIdHandler : singleIdHandler;
