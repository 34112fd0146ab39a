import { Data } from "effect"

// ============================================================================
// Effect TaggedError Storage Error Types
// ============================================================================

export type StorageOperation = "find" | "insert" | "update" | "delete"

/**
 * Raised by storage drivers. The unit of work never wraps or retries it.
 */
export class StorageError extends Data.TaggedError("StorageError")<{
	readonly storageName: string
	readonly operation: StorageOperation
	readonly message: string
	readonly cause?: unknown
}> {}
