/**
 * EntityManager: the application-facing facade over one unit of work.
 *
 * Usage:
 * ```ts
 * const program = Effect.gen(function* () {
 *   const em = yield* EntityManager
 *   const user = yield* em.find(UserMetadata, 42)
 *   user.name = "Renamed"
 *   yield* em.flush()
 * })
 *
 * await program.pipe(
 *   Effect.provide(makeEntityManagerLayer([UserMetadata, AddressMetadata])),
 *   Effect.provide(InMemoryDriverLayer),
 *   Effect.runPromise,
 * )
 * ```
 */

import { Context, Effect, Layer } from "effect";
import type { MappingError } from "../errors/mapping-errors.js";
import type { NotManagedError } from "../errors/unit-of-work-errors.js";
import type { RawKey } from "../id/identifier.js";
import type { ClassMetadata } from "../mapping/class-metadata.js";
import {
	MetadataRegistry,
	makeMetadataRegistryLayer,
} from "../mapping/metadata-registry.js";
import type { StorageDriver } from "../storage/storage-driver.js";
import {
	type CommitError,
	makeUnitOfWork,
	type ReconstituteError,
	type ScheduleForInsertError,
	UnitOfWork,
	type UnitOfWorkConfig,
	type UnitOfWorkShape,
} from "../unit-of-work/unit-of-work.js";

// ============================================================================
// Service
// ============================================================================

export interface EntityManagerShape {
	readonly find: <T extends object>(
		metadata: ClassMetadata<T>,
		key: RawKey,
	) => Effect.Effect<T, ReconstituteError>;
	readonly persist: (
		instance: object,
	) => Effect.Effect<void, ScheduleForInsertError>;
	readonly remove: (instance: object) => Effect.Effect<void, NotManagedError>;
	readonly flush: () => Effect.Effect<void, CommitError>;
	readonly clear: () => Effect.Effect<void>;
	readonly contains: (instance: object) => Effect.Effect<boolean>;
	readonly getClassMetadata: (
		name: string,
	) => Effect.Effect<ClassMetadata, MappingError>;
	readonly unitOfWork: UnitOfWorkShape;
}

export class EntityManager extends Context.Tag("EntityManager")<
	EntityManager,
	EntityManagerShape
>() {}

// ============================================================================
// Construction
// ============================================================================

export const makeEntityManager: Effect.Effect<
	EntityManagerShape,
	never,
	UnitOfWork | MetadataRegistry
> = Effect.gen(function* () {
	const unitOfWork = yield* UnitOfWork;
	const registry = yield* MetadataRegistry;

	return {
		find: unitOfWork.reconstitute,
		persist: unitOfWork.scheduleForInsert,
		remove: unitOfWork.scheduleForDelete,
		flush: unitOfWork.commit,
		clear: unitOfWork.clear,
		contains: unitOfWork.contains,
		getClassMetadata: registry.getMetadataFor,
		unitOfWork,
	};
});

/**
 * EntityManager over a fresh unit of work and a registry built from
 * `metadata`. Requires only a StorageDriver.
 */
export const makeEntityManagerLayer = (
	metadata: ReadonlyArray<ClassMetadata>,
	config: UnitOfWorkConfig = {},
): Layer.Layer<EntityManager, MappingError, StorageDriver> => {
	const dependencies = Layer.effect(UnitOfWork, makeUnitOfWork(config)).pipe(
		Layer.provideMerge(makeMetadataRegistryLayer(metadata)),
	);
	return Layer.effect(EntityManager, makeEntityManager).pipe(
		Layer.provide(dependencies),
	);
};
