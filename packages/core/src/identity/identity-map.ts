import { Option } from "effect";

/**
 * Type name to identifier hash to live instance. Holds at most one instance
 * per identity.
 */
export interface IdentityMap {
	readonly get: (type: string, hash: string) => Option.Option<object>;
	readonly has: (type: string, hash: string) => boolean;
	readonly set: (type: string, hash: string, instance: object) => void;
	readonly remove: (type: string, hash: string) => void;
	/** Every registered instance with its type name, grouped by type. */
	readonly entries: () => ReadonlyArray<readonly [type: string, instance: object]>;
	readonly clear: () => void;
}

export const makeIdentityMap = (): IdentityMap => {
	const types = new Map<string, Map<string, object>>();

	const bucket = (type: string): Map<string, object> => {
		const existing = types.get(type);
		if (existing !== undefined) {
			return existing;
		}
		const created = new Map<string, object>();
		types.set(type, created);
		return created;
	};

	return {
		get: (type, hash) => Option.fromNullable(types.get(type)?.get(hash)),
		has: (type, hash) => types.get(type)?.has(hash) ?? false,
		set: (type, hash, instance) => {
			bucket(type).set(hash, instance);
		},
		remove: (type, hash) => {
			const instances = types.get(type);
			if (instances === undefined) {
				return;
			}
			instances.delete(hash);
			if (instances.size === 0) {
				types.delete(type);
			}
		},
		entries: () =>
			Array.from(types, ([type, instances]) =>
				Array.from(instances.values(), (instance) => [type, instance] as const),
			).flat(),
		clear: () => {
			types.clear();
		},
	};
};
