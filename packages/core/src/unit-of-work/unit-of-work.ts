/**
 * Unit of work: tracks the instances loaded or scheduled through it and
 * writes every pending change to the storage driver in one commit.
 *
 * State (identity map, identifiers, original data, pending insertions and
 * deletions) is private to each unit of work and keyed by entity handle.
 * Storage calls are issued one at a time, in order: updates, insertions,
 * deletions. A failing call aborts the rest of the commit; whatever was
 * already written stands and is reflected in the tracking tables.
 */

import { Context, Effect, Layer, Option } from "effect";
import { MappingError } from "../errors/mapping-errors.js";
import type { StorageError } from "../errors/storage-errors.js";
import {
	DuplicateIdentifierError,
	InvalidIdentifierError,
	MissingIdentifierError,
	NotFoundError,
	NotManagedError,
} from "../errors/unit-of-work-errors.js";
import { type IdConverter, passthroughIdConverter } from "../id/id-converter.js";
import { selectIdHandler } from "../id/id-handler.js";
import {
	formatIdentifier,
	type Identifier,
	isCompositeIdentifier,
	type RawKey,
} from "../id/identifier.js";
import { type EntityHandle, makeHandleTable } from "../identity/entity-handle.js";
import { makeIdentityMap } from "../identity/identity-map.js";
import {
	type ClassMetadata,
	readField,
	writeField,
} from "../mapping/class-metadata.js";
import { MetadataRegistry } from "../mapping/metadata-registry.js";
import { computeChangeSet } from "../snapshot/change-set.js";
import {
	alignEmbedded,
	copyValue,
	isPlainRecord,
	takeSnapshot,
} from "../snapshot/snapshot.js";
import { StorageDriver } from "../storage/storage-driver.js";
import type { RawRecord } from "../types/record-types.js";

// ============================================================================
// Types
// ============================================================================

export interface UnitOfWorkConfig {
	/** Defaults to the passthrough converter. */
	readonly idConverter?: IdConverter;
}

export type ReconstituteError =
	| NotFoundError
	| InvalidIdentifierError
	| MappingError
	| StorageError;

export type ScheduleForInsertError =
	| MissingIdentifierError
	| DuplicateIdentifierError
	| InvalidIdentifierError
	| MappingError;

export type CommitError = MissingIdentifierError | MappingError | StorageError;

export interface UnitOfWorkShape {
	/**
	 * Load an entity by key. Returns the instance already mapped for that
	 * identity, if any; fails with NotFoundError when storage has no record.
	 */
	readonly reconstitute: <T extends object>(
		metadata: ClassMetadata<T>,
		key: RawKey,
	) => Effect.Effect<T, ReconstituteError>;
	/**
	 * Build and register a managed instance from a stored record. Idempotent
	 * per identity.
	 */
	readonly createEntity: <T extends object>(
		metadata: ClassMetadata<T>,
		id: Identifier,
		data: RawRecord,
	) => Effect.Effect<T, MappingError>;
	/** Build an embedded instance. Nothing is registered. */
	readonly createEmbeddedEntity: <T extends object>(
		metadata: ClassMetadata<T>,
		data: RawRecord,
	) => Effect.Effect<T, MappingError>;
	readonly scheduleForInsert: (
		instance: object,
	) => Effect.Effect<void, ScheduleForInsertError>;
	readonly scheduleForDelete: (
		instance: object,
	) => Effect.Effect<void, NotManagedError>;
	readonly commit: () => Effect.Effect<void, CommitError>;
	/** Detach everything. No storage calls are made. */
	readonly clear: () => Effect.Effect<void>;
	/** Whether the instance is managed or pending insertion. */
	readonly contains: (instance: object) => Effect.Effect<boolean>;
	/** Serialized identifier of a managed instance. */
	readonly getIdentifier: (
		instance: object,
	) => Effect.Effect<Identifier, NotManagedError>;
}

export class UnitOfWork extends Context.Tag("UnitOfWork")<
	UnitOfWork,
	UnitOfWorkShape
>() {}

type Registration = {
	readonly metadata: ClassMetadata;
	readonly hash: string;
};

// ============================================================================
// Helpers
// ============================================================================

const copyRecord = (record: RawRecord): RawRecord =>
	Object.fromEntries(
		Object.entries(record).map(([field, value]) => [field, copyValue(value)]),
	);

/**
 * Identifier fields missing from a stored record are filled in from the
 * identifier it was found under.
 */
const assignIdentifier = (
	metadata: ClassMetadata,
	instance: object,
	id: Identifier,
): void => {
	const values: ReadonlyArray<readonly [string, unknown]> =
		isCompositeIdentifier(id)
			? Object.entries(id)
			: metadata.identifier.slice(0, 1).map((field) => [field, id] as const);
	for (const [field, value] of values) {
		if (readField(instance, field) === undefined) {
			writeField(instance, field, value);
		}
	}
};

const entityName = (instance: object): string => instance.constructor.name;

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a unit of work over the StorageDriver and MetadataRegistry in
 * context. The driver's capability flags are read here, once.
 */
export const makeUnitOfWork = (
	config: UnitOfWorkConfig = {},
): Effect.Effect<UnitOfWorkShape, never, StorageDriver | MetadataRegistry> =>
	Effect.gen(function* () {
		const driver = yield* StorageDriver;
		const registry = yield* MetadataRegistry;

		const idConverter = config.idConverter ?? passthroughIdConverter;
		const supportsPartialUpdates = driver.supportsPartialUpdates;
		const idHandler = selectIdHandler(driver.supportsCompositePrimaryKeys);

		const handles = makeHandleTable();
		const identityMap = makeIdentityMap();
		const registrations = new Map<EntityHandle, Registration>();
		const identifiers = new Map<EntityHandle, Identifier>();
		const originalData = new Map<EntityHandle, RawRecord>();
		const scheduledInsertions = new Map<EntityHandle, object>();
		const scheduledDeletions = new Map<EntityHandle, object>();

		// ------------------------------------------------------------------
		// Identity map bookkeeping
		// ------------------------------------------------------------------

		const register = (
			handle: EntityHandle,
			metadata: ClassMetadata,
			id: Identifier,
			instance: object,
		): void => {
			const hash = idHandler.hash(id);
			const previous = registrations.get(handle);
			if (previous !== undefined && previous.hash !== hash) {
				identityMap.remove(previous.metadata.name, previous.hash);
			}
			registrations.set(handle, { metadata, hash });
			identityMap.set(metadata.name, hash, instance);
		};

		const tryGetById = <T extends object>(
			metadata: ClassMetadata<T>,
			id: Identifier,
		): Option.Option<T> =>
			identityMap
				.get(metadata.name, idHandler.hash(id))
				.pipe(
					Option.filter(
						(instance): instance is T => instance instanceof metadata.entityClass,
					),
				);

		// ------------------------------------------------------------------
		// Hydration
		// ------------------------------------------------------------------

		const hydrate = (
			metadata: ClassMetadata,
			instance: object,
			data: RawRecord,
		): Effect.Effect<void, MappingError> =>
			Effect.forEach(
				Object.entries(data),
				([field, value]): Effect.Effect<void, MappingError> => {
					const mapping = metadata.fields.get(field);
					if (mapping === undefined || mapping._tag === "Plain") {
						// identifier fields and extra attributes land here too
						writeField(instance, field, value);
						return Effect.void;
					}
					if (mapping._tag === "Transient") {
						return Effect.void;
					}
					// an empty record is what a missing embedded instance snapshots to
					if (
						value === undefined ||
						(isPlainRecord(value) && Object.keys(value).length === 0)
					) {
						writeField(instance, field, null);
						return Effect.void;
					}
					if (!isPlainRecord(value)) {
						writeField(instance, field, value);
						return Effect.void;
					}
					return registry.getMetadataFor(mapping.target).pipe(
						Effect.flatMap((target) => createEmbeddedEntity(target, value)),
						Effect.map((embedded) => writeField(instance, field, embedded)),
					);
				},
				{ discard: true },
			);

		const createEmbeddedEntity = <T extends object>(
			metadata: ClassMetadata<T>,
			data: RawRecord,
		): Effect.Effect<T, MappingError> =>
			Effect.gen(function* () {
				const instance = metadata.newInstance();
				yield* hydrate(metadata, instance, idConverter.unserialize(metadata, data));
				return instance;
			});

		const createEntity = <T extends object>(
			metadata: ClassMetadata<T>,
			id: Identifier,
			data: RawRecord,
		): Effect.Effect<T, MappingError> =>
			Effect.gen(function* () {
				const existing = tryGetById(metadata, id);
				if (Option.isSome(existing)) {
					return existing.value;
				}

				const instance = metadata.newInstance();
				yield* hydrate(metadata, instance, idConverter.unserialize(metadata, data));
				assignIdentifier(metadata, instance, id);

				const handle = handles.acquire(instance);
				originalData.set(handle, copyRecord(data));
				identifiers.set(handle, idConverter.serialize(metadata, id));
				register(handle, metadata, id, instance);
				return instance;
			});

		// ------------------------------------------------------------------
		// Loading
		// ------------------------------------------------------------------

		const reconstitute = <T extends object>(
			metadata: ClassMetadata<T>,
			key: RawKey,
		): Effect.Effect<T, ReconstituteError> =>
			Effect.gen(function* () {
				if (metadata.embeddable) {
					return yield* new MappingError({
						entity: metadata.name,
						reason: "embeddable types have no identity of their own",
						message: `Cannot load '${metadata.name}': embeddable types have no identity of their own`,
					});
				}
				const id = yield* idHandler.normalizeId(metadata, key);
				const found = yield* driver.find(
					metadata.storageName,
					idConverter.serialize(metadata, id),
				);
				if (Option.isNone(found)) {
					return yield* new NotFoundError({
						entity: metadata.name,
						id: formatIdentifier(id),
						message: `No '${metadata.name}' stored under '${formatIdentifier(id)}'`,
					});
				}
				return yield* createEntity(metadata, id, found.value);
			});

		// ------------------------------------------------------------------
		// Scheduling
		// ------------------------------------------------------------------

		const isTracked = (handle: EntityHandle): boolean =>
			identifiers.has(handle) || scheduledInsertions.has(handle);

		const scheduleForInsert = (
			instance: object,
		): Effect.Effect<void, ScheduleForInsertError> =>
			Effect.gen(function* () {
				if (Option.exists(handles.lookup(instance), isTracked)) {
					return;
				}

				const metadata = yield* registry.getMetadataForInstance(instance);
				if (metadata.embeddable) {
					return yield* new MappingError({
						entity: metadata.name,
						reason: "embeddable types cannot be persisted on their own",
						message: `Cannot persist '${metadata.name}': embeddable types cannot be persisted on their own`,
					});
				}
				if (!idHandler.supports(metadata)) {
					return yield* new InvalidIdentifierError({
						entity: metadata.name,
						message: `'${metadata.name}' has a composite identifier, which the storage driver does not support`,
					});
				}

				const id = idHandler.getIdentifier(metadata, instance);
				if (Option.isNone(id)) {
					return yield* new MissingIdentifierError({
						entity: metadata.name,
						message: `Cannot persist '${metadata.name}' without an identifier`,
					});
				}
				if (identityMap.has(metadata.name, idHandler.hash(id.value))) {
					return yield* new DuplicateIdentifierError({
						entity: metadata.name,
						id: formatIdentifier(id.value),
						message: `A '${metadata.name}' with identifier '${formatIdentifier(id.value)}' is already managed`,
					});
				}

				const handle = handles.acquire(instance);
				scheduledInsertions.set(handle, instance);
				register(handle, metadata, id.value, instance);
			});

		const scheduleForDelete = (
			instance: object,
		): Effect.Effect<void, NotManagedError> =>
			Effect.suspend(() => {
				const handle = handles
					.lookup(instance)
					.pipe(Option.filter((candidate) => identifiers.has(candidate)));
				if (Option.isNone(handle)) {
					return Effect.fail(
						new NotManagedError({
							entity: entityName(instance),
							message: `Cannot delete '${entityName(instance)}': only managed instances can be deleted`,
						}),
					);
				}
				scheduledDeletions.set(handle.value, instance);
				return Effect.void;
			});

		// ------------------------------------------------------------------
		// Commit passes
		// ------------------------------------------------------------------

		const processIdentityMap = () =>
			Effect.forEach(
				identityMap.entries(),
				([type, instance]) =>
					Effect.gen(function* () {
						const handle = Option.getOrUndefined(handles.lookup(instance));
						if (handle === undefined || scheduledInsertions.has(handle)) {
							return 0;
						}
						const registration = registrations.get(handle);
						const original = originalData.get(handle);
						const id = identifiers.get(handle);
						if (
							registration === undefined ||
							original === undefined ||
							id === undefined
						) {
							return 0;
						}

						const { metadata } = registration;
						const snapshot = yield* takeSnapshot(registry, metadata, instance);
						const changeSet = computeChangeSet(
							snapshot,
							yield* alignEmbedded(registry, metadata, original),
						);
						if (Object.keys(changeSet).length === 0) {
							return 0;
						}

						const merged = { ...original, ...changeSet };
						yield* driver.update(
							metadata.storageName,
							id,
							supportsPartialUpdates ? changeSet : merged,
						);
						originalData.set(handle, merged);
						yield* Effect.logDebug(
							`updated ${Object.keys(changeSet).join(", ")}`,
						).pipe(
							Effect.annotateLogs({ entity: type, id: formatIdentifier(id) }),
						);
						return 1;
					}),
			).pipe(
				Effect.map((updated) => updated.reduce<number>((total, n) => total + n, 0)),
				Effect.tap((count) =>
					Effect.logDebug(`update pass wrote ${count} record(s)`),
				),
			);

		const processInsertions = () =>
			Effect.forEach(
				Array.from(scheduledInsertions),
				([handle, instance]) =>
					Effect.gen(function* () {
						const metadata =
							registrations.get(handle)?.metadata ??
							(yield* registry.getMetadataForInstance(instance));
						const id = idHandler.getIdentifier(metadata, instance);
						if (Option.isNone(id)) {
							return yield* new MissingIdentifierError({
								entity: metadata.name,
								message: `Cannot insert '${metadata.name}' without an identifier`,
							});
						}
						const serialized = idConverter.serialize(metadata, id.value);
						const data = yield* takeSnapshot(registry, metadata, instance);

						yield* driver.insert(metadata.storageName, serialized, data);

						scheduledInsertions.delete(handle);
						originalData.set(handle, data);
						identifiers.set(handle, serialized);
						register(handle, metadata, id.value, instance);
						yield* Effect.logDebug("inserted").pipe(
							Effect.annotateLogs({
								entity: metadata.name,
								id: formatIdentifier(serialized),
							}),
						);
					}),
				{ discard: true },
			);

		const processDeletions = () =>
			Effect.forEach(
				Array.from(scheduledDeletions),
				([handle, instance]) =>
					Effect.gen(function* () {
						const registration = registrations.get(handle);
						const id = identifiers.get(handle);
						if (registration === undefined || id === undefined) {
							scheduledDeletions.delete(handle);
							return;
						}

						yield* driver.delete(registration.metadata.storageName, id);

						scheduledDeletions.delete(handle);
						identifiers.delete(handle);
						originalData.delete(handle);
						registrations.delete(handle);
						identityMap.remove(registration.metadata.name, registration.hash);
						handles.release(instance);
						yield* Effect.logDebug("deleted").pipe(
							Effect.annotateLogs({
								entity: registration.metadata.name,
								id: formatIdentifier(id),
							}),
						);
					}),
				{ discard: true },
			);

		const commit = (): Effect.Effect<void, CommitError> =>
			Effect.gen(function* () {
				yield* processIdentityMap();
				yield* processInsertions();
				yield* processDeletions();
				scheduledInsertions.clear();
				scheduledDeletions.clear();
			}).pipe(Effect.withLogSpan("unit-of-work.commit"));

		// ------------------------------------------------------------------
		// Detaching and inspection
		// ------------------------------------------------------------------

		const clear = (): Effect.Effect<void> =>
			Effect.sync(() => {
				scheduledInsertions.clear();
				scheduledDeletions.clear();
				identifiers.clear();
				originalData.clear();
				registrations.clear();
				identityMap.clear();
				handles.clear();
			});

		const contains = (instance: object): Effect.Effect<boolean> =>
			Effect.sync(() => Option.exists(handles.lookup(instance), isTracked));

		const getIdentifier = (
			instance: object,
		): Effect.Effect<Identifier, NotManagedError> =>
			Effect.suspend(() => {
				const id = handles
					.lookup(instance)
					.pipe(Option.flatMapNullable((handle) => identifiers.get(handle)));
				return Option.isSome(id)
					? Effect.succeed(id.value)
					: Effect.fail(
							new NotManagedError({
								entity: entityName(instance),
								message: `'${entityName(instance)}' is not managed by this unit of work`,
							}),
						);
			});

		return {
			reconstitute,
			createEntity,
			createEmbeddedEntity,
			scheduleForInsert,
			scheduleForDelete,
			commit,
			clear,
			contains,
			getIdentifier,
		};
	});

// ============================================================================
// Layer construction
// ============================================================================

/**
 * A fresh unit of work per build of the layer.
 */
export const makeUnitOfWorkLayer = (
	config: UnitOfWorkConfig = {},
): Layer.Layer<UnitOfWork, never, StorageDriver | MetadataRegistry> =>
	Layer.effect(UnitOfWork, makeUnitOfWork(config));
