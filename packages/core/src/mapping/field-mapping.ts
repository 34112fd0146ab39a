import { Data } from "effect";

/**
 * How a declared field of a mapped class is persisted.
 *
 * - `Plain`: stored as-is in the owner's record
 * - `Embedded`: a nested object of the named embeddable type, stored inline
 * - `Transient`: never read, written or persisted
 */
export type FieldMapping = Data.TaggedEnum<{
	// biome-ignore lint/complexity/noBannedTypes: tagged enum member without fields
	Plain: {};
	Embedded: { readonly target: string };
	// biome-ignore lint/complexity/noBannedTypes: tagged enum member without fields
	Transient: {};
}>;

export const FieldMapping = Data.taggedEnum<FieldMapping>();
