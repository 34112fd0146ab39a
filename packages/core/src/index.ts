/**
 * Main entry point for @stowage/core.
 *
 * Exports the Effect-based unit of work and entity manager, the mapping
 * layer, identifier handling, the storage driver contract with its
 * in-memory implementation, and the typed errors.
 */

// ============================================================================
// Entity Manager & Unit of Work
// ============================================================================

export {
	EntityManager,
	makeEntityManager,
	makeEntityManagerLayer,
} from "./entity-manager/entity-manager.js";

export type { EntityManagerShape } from "./entity-manager/entity-manager.js";

export {
	makeUnitOfWork,
	makeUnitOfWorkLayer,
	UnitOfWork,
} from "./unit-of-work/unit-of-work.js";

export type {
	CommitError,
	ReconstituteError,
	ScheduleForInsertError,
	UnitOfWorkConfig,
	UnitOfWorkShape,
} from "./unit-of-work/unit-of-work.js";

// ============================================================================
// Mapping
// ============================================================================

export { FieldMapping } from "./mapping/field-mapping.js";

export {
	defineEmbeddable,
	defineEntity,
	isMappedField,
	readField,
	writeField,
} from "./mapping/class-metadata.js";

export type {
	ClassMetadata,
	EmbeddableDefinition,
	EntityClass,
	EntityDefinition,
} from "./mapping/class-metadata.js";

export {
	MetadataRegistry,
	makeMetadataRegistry,
	makeMetadataRegistryLayer,
} from "./mapping/metadata-registry.js";

export type { MetadataRegistryShape } from "./mapping/metadata-registry.js";

// ============================================================================
// Identifiers
// ============================================================================

export {
	formatIdentifier,
	hashIdentifier,
	isCompositeIdentifier,
	isIdentifierValue,
} from "./id/identifier.js";

export type {
	CompositeIdentifier,
	Identifier,
	IdentifierValue,
	RawKey,
} from "./id/identifier.js";

export {
	compositeIdHandler,
	selectIdHandler,
	singleIdHandler,
} from "./id/id-handler.js";

export type { IdHandler } from "./id/id-handler.js";

export {
	makeEncodedKeyConverter,
	passthroughIdConverter,
} from "./id/id-converter.js";

export type {
	EncodedKeyConverterConfig,
	IdConverter,
} from "./id/id-converter.js";

// ============================================================================
// Snapshots & Identity
// ============================================================================

export { copyValue, takeSnapshot } from "./snapshot/snapshot.js";
export { computeChangeSet, isIdentical } from "./snapshot/change-set.js";
export { EntityHandle, makeHandleTable } from "./identity/entity-handle.js";
export type { HandleTable } from "./identity/entity-handle.js";
export { makeIdentityMap } from "./identity/identity-map.js";
export type { IdentityMap } from "./identity/identity-map.js";

export type { RawRecord, Snapshot } from "./types/record-types.js";

// ============================================================================
// Storage
// ============================================================================

export { StorageDriver } from "./storage/storage-driver.js";
export type { StorageDriverShape } from "./storage/storage-driver.js";

export {
	InMemoryDriverLayer,
	makeInMemoryDriver,
	makeInMemoryDriverLayer,
} from "./storage/in-memory-driver-layer.js";

export type {
	InMemoryDriverConfig,
	InMemoryStore,
} from "./storage/in-memory-driver-layer.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	DuplicateIdentifierError,
	InvalidIdentifierError,
	MappingError,
	MissingIdentifierError,
	NotFoundError,
	NotManagedError,
	StorageError,
} from "./errors/index.js";

export type {
	StorageOperation,
	StowageError,
	UnitOfWorkError,
} from "./errors/index.js";
