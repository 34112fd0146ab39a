import { Brand, Option } from "effect";

/**
 * Opaque handle of a tracked instance, assigned the first time a unit of
 * work sees it. Every private table of the unit of work is keyed by handle.
 */
export type EntityHandle = number & Brand.Brand<"EntityHandle">;

export const EntityHandle = Brand.nominal<EntityHandle>();

export interface HandleTable {
	readonly lookup: (instance: object) => Option.Option<EntityHandle>;
	/** Existing handle of the instance, or a fresh one. */
	readonly acquire: (instance: object) => EntityHandle;
	readonly release: (instance: object) => void;
	readonly clear: () => void;
}

export const makeHandleTable = (): HandleTable => {
	let next = 0;
	let handles = new WeakMap<object, EntityHandle>();

	const lookup = (instance: object) => Option.fromNullable(handles.get(instance));

	const acquire = (instance: object) => {
		const existing = handles.get(instance);
		if (existing !== undefined) {
			return existing;
		}
		next += 1;
		const handle = EntityHandle(next);
		handles.set(instance, handle);
		return handle;
	};

	return {
		lookup,
		acquire,
		release: (instance) => {
			handles.delete(instance);
		},
		clear: () => {
			handles = new WeakMap();
		},
	};
};
