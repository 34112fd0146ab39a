// ============================================================================
// Unit of Work Errors (re-exported from unit-of-work-errors.ts)
// ============================================================================

export type { UnitOfWorkError } from "./unit-of-work-errors.js";
export {
	DuplicateIdentifierError,
	InvalidIdentifierError,
	MissingIdentifierError,
	NotFoundError,
	NotManagedError,
} from "./unit-of-work-errors.js";

// ============================================================================
// Mapping Errors (re-exported from mapping-errors.ts)
// ============================================================================

export { MappingError } from "./mapping-errors.js";

// ============================================================================
// Storage Errors (re-exported from storage-errors.ts)
// ============================================================================

export type { StorageOperation } from "./storage-errors.js";
export { StorageError } from "./storage-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { MappingError } from "./mapping-errors.js";
import type { StorageError } from "./storage-errors.js";
import type { UnitOfWorkError } from "./unit-of-work-errors.js";

export type StowageError = UnitOfWorkError | MappingError | StorageError;
