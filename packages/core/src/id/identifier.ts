import { Predicate } from "effect";

// ============================================================================
// Identifier Types
// ============================================================================

export type IdentifierValue = string | number;

/**
 * Composite identifier: identifier field name to value, keys in the
 * declared field order of the owning class.
 */
export type CompositeIdentifier = Readonly<Record<string, IdentifierValue>>;

export type Identifier = IdentifierValue | CompositeIdentifier;

/**
 * A key as supplied by callers, before normalization.
 */
export type RawKey = IdentifierValue | Readonly<Record<string, unknown>>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Non-empty strings and finite numbers. Everything else counts as unset.
 */
export const isIdentifierValue = (value: unknown): value is IdentifierValue =>
	(Predicate.isString(value) && value.length > 0) ||
	(Predicate.isNumber(value) && Number.isFinite(value));

export const isCompositeIdentifier = (
	id: Identifier,
): id is CompositeIdentifier => Predicate.isRecord(id);

/**
 * Order-dependent over composite fields. Scalars keep their type, so 1 and
 * "1" never share a hash.
 */
export const hashIdentifier = (id: Identifier): string =>
	isCompositeIdentifier(id)
		? JSON.stringify(Object.entries(id))
		: JSON.stringify(id);

export const formatIdentifier = (id: Identifier): string =>
	isCompositeIdentifier(id)
		? Object.entries(id)
				.map(([field, value]) => `${field}=${value}`)
				.join(", ")
		: String(id);
