/**
 * Class metadata: the read-only descriptor the unit of work consumes to
 * know where a class is stored, which fields make up its identifier and how
 * every other field is persisted.
 */

import type { FieldMapping } from "./field-mapping.js";

// ============================================================================
// Types
// ============================================================================

export type EntityClass<T extends object> = new () => T;

export interface ClassMetadata<T extends object = object> {
	readonly name: string;
	readonly entityClass: EntityClass<T>;
	/** Empty for embeddables, which have no storage of their own. */
	readonly storageName: string;
	readonly embeddable: boolean;
	/** Identifier field names in declared order. */
	readonly identifier: ReadonlyArray<string>;
	readonly isCompositeKey: boolean;
	/** Declared non-identifier fields, in declaration order. */
	readonly fields: ReadonlyMap<string, FieldMapping>;
	readonly newInstance: () => T;
}

export interface EntityDefinition {
	/** Type name used by the identity map. Defaults to the class name. */
	readonly name?: string;
	readonly storageName: string;
	readonly identifier: string | ReadonlyArray<string>;
	readonly fields?: Readonly<Record<string, FieldMapping>>;
}

export interface EmbeddableDefinition {
	readonly name?: string;
	readonly fields?: Readonly<Record<string, FieldMapping>>;
}

// ============================================================================
// Definitions
// ============================================================================

/**
 * Describe a class persisted under its own identity.
 *
 * ```ts
 * class User {
 *   id = 0
 *   name = ""
 *   address: Address | null = null
 * }
 *
 * const UserMetadata = defineEntity(User, {
 *   storageName: "users",
 *   identifier: "id",
 *   fields: {
 *     name: FieldMapping.Plain(),
 *     address: FieldMapping.Embedded({ target: "Address" }),
 *   },
 * })
 * ```
 */
export const defineEntity = <T extends object>(
	entityClass: EntityClass<T>,
	definition: EntityDefinition,
): ClassMetadata<T> => {
	const identifier =
		typeof definition.identifier === "string"
			? [definition.identifier]
			: [...definition.identifier];
	return {
		name: definition.name ?? entityClass.name,
		entityClass,
		storageName: definition.storageName,
		embeddable: false,
		identifier,
		isCompositeKey: identifier.length > 1,
		fields: new Map(Object.entries(definition.fields ?? {})),
		newInstance: () => new entityClass(),
	};
};

/**
 * Describe a class that only ever lives inline inside an owning entity.
 */
export const defineEmbeddable = <T extends object>(
	entityClass: EntityClass<T>,
	definition: EmbeddableDefinition = {},
): ClassMetadata<T> => ({
	name: definition.name ?? entityClass.name,
	entityClass,
	storageName: "",
	embeddable: true,
	identifier: [],
	isCompositeKey: false,
	fields: new Map(Object.entries(definition.fields ?? {})),
	newInstance: () => new entityClass(),
});

// ============================================================================
// Field access
// ============================================================================

/**
 * Whether the mapping names this property at all (identifier, plain,
 * embedded or transient).
 */
export const isMappedField = (
	metadata: ClassMetadata,
	field: string,
): boolean =>
	metadata.identifier.includes(field) || metadata.fields.has(field);

export const readField = (instance: object, field: string): unknown =>
	Reflect.get(instance, field);

export const writeField = (
	instance: object,
	field: string,
	value: unknown,
): void => {
	Reflect.set(instance, field, value);
};
