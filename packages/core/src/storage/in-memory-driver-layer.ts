/**
 * In-memory implementation of StorageDriver as an Effect Layer.
 * Records live in nested Maps (storage name, then identifier hash); reads
 * and writes copy, so callers never share a record with the store.
 */

import { Effect, Layer, Option } from "effect"
import { StorageError } from "../errors/storage-errors.js"
import { formatIdentifier, hashIdentifier, type Identifier } from "../id/identifier.js"
import { copyValue } from "../snapshot/snapshot.js"
import type { RawRecord } from "../types/record-types.js"
import { StorageDriver, type StorageDriverShape } from "./storage-driver.js"

// ============================================================================
// Configuration
// ============================================================================

export type InMemoryStore = Map<string, Map<string, RawRecord>>

export interface InMemoryDriverConfig {
	readonly store?: InMemoryStore
	readonly supportsCompositePrimaryKeys?: boolean
	readonly supportsPartialUpdates?: boolean
}

const defaultConfig = {
	supportsCompositePrimaryKeys: true,
	supportsPartialUpdates: true,
}

// ============================================================================
// In-memory driver
// ============================================================================

const copyRecord = (record: RawRecord): RawRecord =>
	Object.fromEntries(
		Object.entries(record).map(([field, value]) => [field, copyValue(value)]),
	)

export const makeInMemoryDriver = (
	config: InMemoryDriverConfig = {},
): StorageDriverShape => {
	const store: InMemoryStore = config.store ?? new Map()
	const { supportsCompositePrimaryKeys, supportsPartialUpdates } = {
		...defaultConfig,
		...config,
	}

	const collection = (storageName: string): Map<string, RawRecord> => {
		const existing = store.get(storageName)
		if (existing !== undefined) {
			return existing
		}
		const created = new Map<string, RawRecord>()
		store.set(storageName, created)
		return created
	}

	const missing = (
		storageName: string,
		operation: "update" | "delete",
		id: Identifier,
	): StorageError =>
		new StorageError({
			storageName,
			operation,
			message: `Record '${formatIdentifier(id)}' not found in '${storageName}'`,
		})

	return {
		supportsCompositePrimaryKeys,
		supportsPartialUpdates,

		find: (storageName, id) =>
			Effect.sync(() =>
				Option.fromNullable(store.get(storageName)?.get(hashIdentifier(id))).pipe(
					Option.map(copyRecord),
				),
			),

		insert: (storageName, id, data) =>
			Effect.sync(() => {
				collection(storageName).set(hashIdentifier(id), copyRecord(data))
			}),

		update: (storageName, id, changeSet) =>
			Effect.suspend(() => {
				const records = collection(storageName)
				const key = hashIdentifier(id)
				const current = records.get(key)
				if (current === undefined) {
					return Effect.fail(missing(storageName, "update", id))
				}
				const next = supportsPartialUpdates
					? { ...current, ...copyRecord(changeSet) }
					: copyRecord(changeSet)
				records.set(key, next)
				return Effect.void
			}),

		delete: (storageName, id) =>
			Effect.suspend(() => {
				const records = collection(storageName)
				if (!records.delete(hashIdentifier(id))) {
					return Effect.fail(missing(storageName, "delete", id))
				}
				return Effect.void
			}),
	}
}

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an in-memory StorageDriver layer.
 * Pass your own store to inspect persisted records in tests.
 */
export const makeInMemoryDriverLayer = (
	config: InMemoryDriverConfig = {},
): Layer.Layer<StorageDriver> =>
	Layer.sync(StorageDriver, () => makeInMemoryDriver(config))

/**
 * In-memory StorageDriver with a fresh store and every capability enabled.
 */
export const InMemoryDriverLayer: Layer.Layer<StorageDriver> =
	makeInMemoryDriverLayer()
