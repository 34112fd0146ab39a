import { Data } from "effect";

// ============================================================================
// Effect TaggedError Unit of Work Error Types
// ============================================================================

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
	readonly entity: string;
	readonly id: string;
	readonly message: string;
}> {}

export class MissingIdentifierError extends Data.TaggedError(
	"MissingIdentifierError",
)<{
	readonly entity: string;
	readonly message: string;
}> {}

export class DuplicateIdentifierError extends Data.TaggedError(
	"DuplicateIdentifierError",
)<{
	readonly entity: string;
	readonly id: string;
	readonly message: string;
}> {}

export class NotManagedError extends Data.TaggedError("NotManagedError")<{
	readonly entity: string;
	readonly message: string;
}> {}

export class InvalidIdentifierError extends Data.TaggedError(
	"InvalidIdentifierError",
)<{
	readonly entity: string;
	readonly field?: string;
	readonly message: string;
}> {}

// ============================================================================
// Effect Unit of Work Error Union
// ============================================================================

export type UnitOfWorkError =
	| NotFoundError
	| MissingIdentifierError
	| DuplicateIdentifierError
	| NotManagedError
	| InvalidIdentifierError;
