import { Effect, Layer } from "effect"
import { StorageError, type StorageOperation } from "../../src/errors/storage-errors.js"
import { hashIdentifier, type Identifier } from "../../src/id/identifier.js"
import { defineEmbeddable, defineEntity } from "../../src/mapping/class-metadata.js"
import { FieldMapping } from "../../src/mapping/field-mapping.js"
import { makeMetadataRegistryLayer } from "../../src/mapping/metadata-registry.js"
import {
	type InMemoryDriverConfig,
	type InMemoryStore,
	makeInMemoryDriver,
} from "../../src/storage/in-memory-driver-layer.js"
import { StorageDriver, type StorageDriverShape } from "../../src/storage/storage-driver.js"
import type { RawRecord } from "../../src/types/record-types.js"
import {
	makeUnitOfWorkLayer,
	type UnitOfWork,
	type UnitOfWorkConfig,
} from "../../src/unit-of-work/unit-of-work.js"

// ============================================================================
// Model
// ============================================================================

export class Address {
	street = ""
	city = ""
}

export class User {
	id: number | undefined = undefined
	name = ""
	email = ""
	tags: string[] = []
	address: Address | null = null
	cache: string | undefined = undefined
}

export class Counter {
	id: number | undefined = undefined
	a = 0
	b = 0
}

export class Membership {
	groupId: string | undefined = undefined
	userId: string | undefined = undefined
	role = "member"
}

export class Unmapped {
	id = 1
}

export const AddressMetadata = defineEmbeddable(Address, {
	fields: {
		street: FieldMapping.Plain(),
		city: FieldMapping.Plain(),
	},
})

export const UserMetadata = defineEntity(User, {
	storageName: "users",
	identifier: "id",
	fields: {
		name: FieldMapping.Plain(),
		email: FieldMapping.Plain(),
		tags: FieldMapping.Plain(),
		address: FieldMapping.Embedded({ target: "Address" }),
		cache: FieldMapping.Transient(),
	},
})

export const CounterMetadata = defineEntity(Counter, {
	storageName: "counters",
	identifier: "id",
	fields: {
		a: FieldMapping.Plain(),
		b: FieldMapping.Plain(),
	},
})

export const MembershipMetadata = defineEntity(Membership, {
	storageName: "memberships",
	identifier: ["groupId", "userId"],
	fields: {
		role: FieldMapping.Plain(),
	},
})

export const allMetadata = [
	AddressMetadata,
	UserMetadata,
	CounterMetadata,
	MembershipMetadata,
]

export const makeCounter = (id: number | undefined, a: number, b: number): Counter => {
	const counter = new Counter()
	counter.id = id
	counter.a = a
	counter.b = b
	return counter
}

// ============================================================================
// Recording driver
// ============================================================================

export interface DriverCall {
	readonly op: StorageOperation
	readonly storageName: string
	readonly id: Identifier
	readonly data?: RawRecord
}

export interface RecordingDriverConfig extends InMemoryDriverConfig {
	/** Every call of this operation fails with a StorageError. */
	readonly failOn?: StorageOperation
}

export interface RecordingDriver {
	readonly driver: StorageDriverShape
	readonly store: InMemoryStore
	readonly calls: DriverCall[]
	/** Calls other than `find`. */
	readonly writes: () => ReadonlyArray<DriverCall>
}

/**
 * In-memory driver that logs every call it receives, in order.
 */
export const makeRecordingDriver = (
	config: RecordingDriverConfig = {},
): RecordingDriver => {
	const store: InMemoryStore = config.store ?? new Map()
	const inner = makeInMemoryDriver({ ...config, store })
	const calls: DriverCall[] = []

	const record = <A>(
		call: DriverCall,
		effect: Effect.Effect<A, StorageError>,
	): Effect.Effect<A, StorageError> =>
		Effect.suspend(() => {
			calls.push(call)
			return config.failOn === call.op
				? Effect.fail(
						new StorageError({
							storageName: call.storageName,
							operation: call.op,
							message: `${call.op} rejected`,
						}),
					)
				: effect
		})

	const driver: StorageDriverShape = {
		supportsCompositePrimaryKeys: inner.supportsCompositePrimaryKeys,
		supportsPartialUpdates: inner.supportsPartialUpdates,
		find: (storageName, id) =>
			record({ op: "find", storageName, id }, inner.find(storageName, id)),
		insert: (storageName, id, data) =>
			record({ op: "insert", storageName, id, data }, inner.insert(storageName, id, data)),
		update: (storageName, id, data) =>
			record({ op: "update", storageName, id, data }, inner.update(storageName, id, data)),
		delete: (storageName, id) =>
			record({ op: "delete", storageName, id }, inner.delete(storageName, id)),
	}

	return {
		driver,
		store,
		calls,
		writes: () => calls.filter((call) => call.op !== "find"),
	}
}

// ============================================================================
// Store helpers
// ============================================================================

export const seed = (
	store: InMemoryStore,
	storageName: string,
	id: Identifier,
	record: RawRecord,
): void => {
	const records = store.get(storageName) ?? new Map<string, RawRecord>()
	records.set(hashIdentifier(id), record)
	store.set(storageName, records)
}

export const stored = (
	store: InMemoryStore,
	storageName: string,
	id: Identifier,
): RawRecord | undefined => store.get(storageName)?.get(hashIdentifier(id))

// ============================================================================
// Running programs
// ============================================================================

export const unitOfWorkLayer = (
	driver: StorageDriverShape,
	config: UnitOfWorkConfig = {},
) =>
	makeUnitOfWorkLayer(config).pipe(
		Layer.provide(
			Layer.merge(
				makeMetadataRegistryLayer(allMetadata),
				Layer.succeed(StorageDriver, driver),
			),
		),
	)

/**
 * Run a program against one fresh unit of work over `driver`.
 */
export const runWith = <A, E>(
	driver: StorageDriverShape,
	program: Effect.Effect<A, E, UnitOfWork>,
	config: UnitOfWorkConfig = {},
): Promise<A> =>
	Effect.runPromise(program.pipe(Effect.provide(unitOfWorkLayer(driver, config))))
