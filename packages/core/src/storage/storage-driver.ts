import { Context, type Effect, type Option } from "effect";
import type { StorageError } from "../errors/storage-errors.js";
import type { Identifier } from "../id/identifier.js";
import type { RawRecord } from "../types/record-types.js";

// ============================================================================
// StorageDriver Effect Service
// ============================================================================

/**
 * A key-value backend. Identifiers arrive already serialized by the unit of
 * work's identifier converter. Capability flags are read once, when a unit
 * of work is built, and must not change afterwards.
 */
export interface StorageDriverShape {
	readonly supportsCompositePrimaryKeys: boolean;
	/**
	 * When false, `update` always receives the whole record rather than only
	 * the changed fields.
	 */
	readonly supportsPartialUpdates: boolean;
	readonly find: (
		storageName: string,
		id: Identifier,
	) => Effect.Effect<Option.Option<RawRecord>, StorageError>;
	readonly insert: (
		storageName: string,
		id: Identifier,
		data: RawRecord,
	) => Effect.Effect<void, StorageError>;
	readonly update: (
		storageName: string,
		id: Identifier,
		changeSet: RawRecord,
	) => Effect.Effect<void, StorageError>;
	readonly delete: (
		storageName: string,
		id: Identifier,
	) => Effect.Effect<void, StorageError>;
}

export class StorageDriver extends Context.Tag("StorageDriver")<
	StorageDriver,
	StorageDriverShape
>() {}
