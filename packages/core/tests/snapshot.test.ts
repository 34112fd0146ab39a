import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { makeMetadataRegistry } from "../src/mapping/metadata-registry.js"
import { computeChangeSet, isIdentical } from "../src/snapshot/change-set.js"
import {
	alignEmbedded,
	copyValue,
	isPlainRecord,
	takeSnapshot,
} from "../src/snapshot/snapshot.js"
import {
	Address,
	AddressMetadata,
	allMetadata,
	CounterMetadata,
	User,
	UserMetadata,
} from "./helpers/fixtures.js"

const registry = Effect.runSync(makeMetadataRegistry(allMetadata))

const makeUser = (): User => {
	const address = new Address()
	address.street = "1 Main St"
	address.city = "Springfield"
	const user = new User()
	user.id = 1
	user.name = "Ada"
	user.email = "ada@example.test"
	user.tags = ["x"]
	user.address = address
	user.cache = "hot"
	return user
}

// ============================================================================
// takeSnapshot
// ============================================================================

describe("takeSnapshot", () => {
	it("captures declared fields, recursing into embedded ones", () => {
		const snapshot = Effect.runSync(takeSnapshot(registry, UserMetadata, makeUser()))

		expect(snapshot).toEqual({
			name: "Ada",
			email: "ada@example.test",
			tags: ["x"],
			address: { street: "1 Main St", city: "Springfield" },
		})
	})

	it("snapshots a missing embedded instance as an empty record", () => {
		const user = makeUser()
		user.address = null

		const snapshot = Effect.runSync(takeSnapshot(registry, UserMetadata, user))

		expect(snapshot.address).toEqual({})
	})

	it("appends extra attributes and leaves out undefined values", () => {
		const user = makeUser()
		Object.assign(user, { nickname: "Countess", gone: undefined })

		const snapshot = Effect.runSync(takeSnapshot(registry, UserMetadata, user))

		expect(Object.keys(snapshot)).toEqual(["name", "email", "tags", "address", "nickname"])
	})

	it("copies arrays so later mutation stays visible", () => {
		const user = makeUser()

		const snapshot = Effect.runSync(takeSnapshot(registry, UserMetadata, user))
		user.tags.push("y")

		expect(snapshot.tags).toEqual(["x"])
	})

	it("snapshots a non-object as an empty record", () => {
		expect(Effect.runSync(takeSnapshot(registry, AddressMetadata, null))).toEqual({})
	})

	it("fails with MappingError when an embedded target is not registered", () => {
		const partial = Effect.runSync(makeMetadataRegistry([CounterMetadata]))

		const error = Effect.runSync(
			takeSnapshot(partial, UserMetadata, makeUser()).pipe(Effect.flip),
		)

		expect(error._tag).toBe("MappingError")
		expect(error.entity).toBe("Address")
	})
})

describe("alignEmbedded", () => {
	it("reads absent and null embedded fields as empty records", () => {
		expect(
			Effect.runSync(alignEmbedded(registry, UserMetadata, { name: "a" })),
		).toEqual({ name: "a", address: {} })
		expect(
			Effect.runSync(alignEmbedded(registry, UserMetadata, { address: null })),
		).toEqual({ address: {} })
	})

	it("leaves stored embedded records and other fields alone", () => {
		const data = { tags: null, address: { city: "Springfield" } }

		expect(Effect.runSync(alignEmbedded(registry, UserMetadata, data))).toEqual(data)
	})

	it("compares a missing embedded instance as unchanged", () => {
		const user = new User()
		user.name = "a"
		const snapshot = Effect.runSync(takeSnapshot(registry, UserMetadata, user))
		const original = Effect.runSync(
			alignEmbedded(registry, UserMetadata, { name: "a", email: "", tags: [] }),
		)

		expect(computeChangeSet(snapshot, original)).toEqual({})
	})
})

// ============================================================================
// Values
// ============================================================================

describe("copyValue", () => {
	it("deep-copies arrays and plain records", () => {
		const value = { list: [1, { nested: true }] }
		const copy = copyValue(value)

		expect(copy).toEqual(value)
		expect(copy).not.toBe(value)
	})

	it("keeps class instances by reference", () => {
		const date = new Date(0)
		expect(copyValue(date)).toBe(date)
		expect(isPlainRecord(date)).toBe(false)
		expect(isPlainRecord(Object.create(null))).toBe(true)
	})
})

describe("isIdentical", () => {
	it("compares leaves strictly", () => {
		expect(isIdentical(1, 1)).toBe(true)
		expect(isIdentical(1, "1")).toBe(false)
		expect(isIdentical(null, undefined)).toBe(false)
		expect(isIdentical(new Date(0), new Date(0))).toBe(false)
	})

	it("compares arrays and plain records structurally", () => {
		expect(isIdentical([1, [2]], [1, [2]])).toBe(true)
		expect(isIdentical([1, 2], [2, 1])).toBe(false)
		expect(isIdentical({ a: { b: 1 } }, { a: { b: 1 } })).toBe(true)
		expect(isIdentical({ a: 1 }, { a: 1, b: undefined })).toBe(false)
	})
})

// ============================================================================
// computeChangeSet
// ============================================================================

describe("computeChangeSet", () => {
	it("reports changed fields only", () => {
		expect(computeChangeSet({ a: 1, b: 3 }, { a: 1, b: 2 })).toEqual({ b: 3 })
	})

	it("reports fields missing from the original", () => {
		expect(computeChangeSet({ a: 1 }, {})).toEqual({ a: 1 })
	})

	it("ignores original fields the snapshot no longer has", () => {
		expect(computeChangeSet({ a: 1 }, { a: 1, c: 2 })).toEqual({})
	})

	it("does not coerce types", () => {
		expect(computeChangeSet({ a: "1" }, { a: 1 })).toEqual({ a: "1" })
	})
})
