import { Effect, Layer } from "effect"
import { describe, expect, it } from "vitest"
import {
	EntityManager,
	makeEntityManagerLayer,
} from "../src/entity-manager/entity-manager.js"
import { makeEncodedKeyConverter } from "../src/id/id-converter.js"
import { defineEntity } from "../src/mapping/class-metadata.js"
import { FieldMapping } from "../src/mapping/field-mapping.js"
import { StorageDriver } from "../src/storage/storage-driver.js"
import type { UnitOfWorkConfig } from "../src/unit-of-work/unit-of-work.js"
import {
	allMetadata,
	CounterMetadata,
	makeCounter,
	makeRecordingDriver,
	seed,
	stored,
	User,
	UserMetadata,
} from "./helpers/fixtures.js"

const layerFor = (
	driver: ReturnType<typeof makeRecordingDriver>["driver"],
	config: UnitOfWorkConfig = {},
) =>
	makeEntityManagerLayer(allMetadata, config).pipe(
		Layer.provide(Layer.succeed(StorageDriver, driver)),
	)

describe("EntityManager", () => {
	it("finds, changes and flushes entities", async () => {
		const { driver, store } = makeRecordingDriver()
		seed(store, "counters", 1, { a: 1, b: 2 })

		await Effect.runPromise(
			Effect.gen(function* () {
				const em = yield* EntityManager
				const counter = yield* em.find(CounterMetadata, 1)
				counter.a = 11
				yield* em.flush()
			}).pipe(Effect.provide(layerFor(driver))),
		)

		expect(stored(store, "counters", 1)).toEqual({ a: 11, b: 2 })
	})

	it("persists and removes entities", async () => {
		const { driver, store, writes } = makeRecordingDriver()
		const counter = makeCounter(5, 1, 2)

		const [afterPersist, afterRemove] = await Effect.runPromise(
			Effect.gen(function* () {
				const em = yield* EntityManager
				yield* em.persist(counter)
				const afterPersist = yield* em.contains(counter)
				yield* em.flush()
				yield* em.remove(counter)
				yield* em.flush()
				const afterRemove = yield* em.contains(counter)
				return [afterPersist, afterRemove] as const
			}).pipe(Effect.provide(layerFor(driver))),
		)

		expect(afterPersist).toBe(true)
		expect(afterRemove).toBe(false)
		expect(writes().map((call) => call.op)).toEqual(["insert", "delete"])
		expect(stored(store, "counters", 5)).toBeUndefined()
	})

	it("clears pending work", async () => {
		const { driver, writes } = makeRecordingDriver()

		await Effect.runPromise(
			Effect.gen(function* () {
				const em = yield* EntityManager
				yield* em.persist(makeCounter(5, 1, 2))
				yield* em.clear()
				yield* em.flush()
			}).pipe(Effect.provide(layerFor(driver))),
		)

		expect(writes()).toEqual([])
	})

	it("exposes class metadata and the underlying unit of work", async () => {
		const { driver, store } = makeRecordingDriver()
		seed(store, "users", 1, { name: "Ada" })

		const [metadata, id] = await Effect.runPromise(
			Effect.gen(function* () {
				const em = yield* EntityManager
				const metadata = yield* em.getClassMetadata("User")
				const user = yield* em.find(UserMetadata, 1)
				const id = yield* em.unitOfWork.getIdentifier(user)
				return [metadata, id] as const
			}).pipe(Effect.provide(layerFor(driver))),
		)

		expect(metadata).toBe(UserMetadata)
		expect(id).toBe(1)
	})

	it("passes the unit of work configuration through", async () => {
		const { driver, calls } = makeRecordingDriver()

		await Effect.runPromise(
			Effect.gen(function* () {
				const em = yield* EntityManager
				yield* em.persist(makeCounter(5, 1, 2))
				yield* em.flush()
			}).pipe(
				Effect.provide(layerFor(driver, { idConverter: makeEncodedKeyConverter() })),
			),
		)

		expect(calls.map((call) => call.id)).toEqual(["5"])
	})

	it("fails to build with invalid metadata", async () => {
		const { driver } = makeRecordingDriver()
		const broken = defineEntity(User, {
			storageName: "users",
			identifier: "id",
			fields: { address: FieldMapping.Embedded({ target: "Nowhere" }) },
		})

		const error = await Effect.runPromise(
			Effect.gen(function* () {
				yield* EntityManager
			}).pipe(
				Effect.provide(
					makeEntityManagerLayer([broken]).pipe(
						Layer.provide(Layer.succeed(StorageDriver, driver)),
					),
				),
				Effect.flip,
			),
		)

		expect(error._tag).toBe("MappingError")
		expect(error.entity).toBe("User")
	})
})
