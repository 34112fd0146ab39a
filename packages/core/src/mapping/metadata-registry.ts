/**
 * MetadataRegistry: the validated set of class metadata known to a unit of work.
 *
 * Lookups go by type name (embedded targets, diagnostics) or by instance
 * (scheduling insertions and deletions), the latter through the instance's
 * constructor.
 */

import { Context, Effect, Layer, type ParseResult, Schema } from "effect";
import { MappingError } from "../errors/mapping-errors.js";
import type { ClassMetadata } from "./class-metadata.js";

// ============================================================================
// Service
// ============================================================================

export interface MetadataRegistryShape {
	readonly getMetadataFor: (
		name: string,
	) => Effect.Effect<ClassMetadata, MappingError>;
	readonly getMetadataForInstance: (
		instance: object,
	) => Effect.Effect<ClassMetadata, MappingError>;
}

export class MetadataRegistry extends Context.Tag("MetadataRegistry")<
	MetadataRegistry,
	MetadataRegistryShape
>() {}

// ============================================================================
// Validation
// ============================================================================

const EntityMappingSchema = Schema.Struct({
	name: Schema.NonEmptyString,
	storageName: Schema.NonEmptyString,
	identifier: Schema.NonEmptyArray(Schema.NonEmptyString),
});

const EmbeddableMappingSchema = Schema.Struct({
	name: Schema.NonEmptyString,
	identifier: Schema.Tuple(),
});

const mappingError = (entity: string, reason: string): MappingError =>
	new MappingError({
		entity,
		reason,
		message: `Invalid mapping for '${entity}': ${reason}`,
	});

const validateShape = (
	metadata: ClassMetadata,
): Effect.Effect<void, MappingError> => {
	const decoded: Effect.Effect<unknown, ParseResult.ParseError> =
		metadata.embeddable
			? Schema.decodeUnknown(EmbeddableMappingSchema)({
					name: metadata.name,
					identifier: metadata.identifier,
				})
			: Schema.decodeUnknown(EntityMappingSchema)({
					name: metadata.name,
					storageName: metadata.storageName,
					identifier: metadata.identifier,
				});
	return decoded.pipe(
		Effect.asVoid,
		Effect.mapError((error) =>
			mappingError(metadata.name || metadata.entityClass.name, error.message),
		),
	);
};

const validateFields = (
	metadata: ClassMetadata,
	byName: ReadonlyMap<string, ClassMetadata>,
): Effect.Effect<void, MappingError> =>
	Effect.forEach(
		metadata.fields,
		([field, mapping]): Effect.Effect<void, MappingError> => {
			if (metadata.identifier.includes(field)) {
				return Effect.fail(
					mappingError(
						metadata.name,
						`identifier field '${field}' is also mapped as a field`,
					),
				);
			}
			if (mapping._tag !== "Embedded") {
				return Effect.void;
			}
			const target = byName.get(mapping.target);
			if (target === undefined) {
				return Effect.fail(
					mappingError(
						metadata.name,
						`embedded field '${field}' targets unknown type '${mapping.target}'`,
					),
				);
			}
			if (!target.embeddable) {
				return Effect.fail(
					mappingError(
						metadata.name,
						`embedded field '${field}' targets '${mapping.target}', which is not embeddable`,
					),
				);
			}
			return Effect.void;
		},
		{ discard: true },
	);

// ============================================================================
// Construction
// ============================================================================

/**
 * Validate and index a set of class metadata.
 *
 * Fails with MappingError on duplicate type names or classes, entities
 * without a storage name or identifier, identifier fields that are also
 * mapped as fields, and embedded fields whose target is unknown or not
 * embeddable.
 */
export const makeMetadataRegistry = (
	metadata: ReadonlyArray<ClassMetadata>,
): Effect.Effect<MetadataRegistryShape, MappingError> =>
	Effect.gen(function* () {
		const byName = new Map<string, ClassMetadata>();
		const byClass = new Map<unknown, ClassMetadata>();

		for (const entry of metadata) {
			yield* validateShape(entry);
			if (byName.has(entry.name)) {
				return yield* mappingError(entry.name, "type name is already registered");
			}
			if (byClass.has(entry.entityClass)) {
				return yield* mappingError(
					entry.name,
					`class '${entry.entityClass.name}' is already registered`,
				);
			}
			byName.set(entry.name, entry);
			byClass.set(entry.entityClass, entry);
		}

		for (const entry of metadata) {
			yield* validateFields(entry, byName);
		}

		const getMetadataFor = (
			name: string,
		): Effect.Effect<ClassMetadata, MappingError> =>
			Effect.suspend(() => {
				const found = byName.get(name);
				return found === undefined
					? Effect.fail(mappingError(name, "type is not mapped"))
					: Effect.succeed(found);
			});

		const getMetadataForInstance = (
			instance: object,
		): Effect.Effect<ClassMetadata, MappingError> =>
			Effect.suspend(() => {
				const found = byClass.get(instance.constructor);
				return found === undefined
					? Effect.fail(
							mappingError(instance.constructor.name, "class is not mapped"),
						)
					: Effect.succeed(found);
			});

		return {
			getMetadataFor,
			getMetadataForInstance,
		};
	});

export const makeMetadataRegistryLayer = (
	metadata: ReadonlyArray<ClassMetadata>,
): Layer.Layer<MetadataRegistry, MappingError> =>
	Layer.effect(MetadataRegistry, makeMetadataRegistry(metadata));
