/**
 * Node.js filesystem implementation of StorageDriver as an Effect Layer.
 *
 * Each record is one JSON document at
 * `<directory>/<storage name>/<encoded identifier>.json`. Writes are atomic
 * (temp file + rename) and retried with exponential backoff. Documents are
 * always rewritten whole, so the driver reports no partial-update support.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname, join } from "node:path";
import {
	formatIdentifier,
	type Identifier,
	isCompositeIdentifier,
	type RawRecord,
	StorageDriver,
	type StorageDriverShape,
	StorageError,
	type StorageOperation,
} from "@stowage/core";
import { Effect, Layer, Option, Predicate, Schedule } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeDriverConfig {
	/** Root directory holding one sub-directory per storage name. */
	readonly directory: string;
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
	readonly fileMode?: number;
	readonly dirMode?: number;
}

const defaultConfig = {
	maxRetries: 3,
	baseDelay: 100,
	fileMode: 0o644,
	dirMode: 0o755,
};

type ResolvedConfig = Required<NodeDriverConfig>;

// ============================================================================
// Helpers
// ============================================================================

const toStorageError = (
	storageName: string,
	operation: StorageOperation,
	error: unknown,
): StorageError =>
	new StorageError({
		storageName,
		operation,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

const isNotFound = (error: unknown): boolean =>
	Predicate.hasProperty(error, "code") && error.code === "ENOENT";

const retryPolicy = (config: ResolvedConfig) =>
	Schedule.intersect(
		Schedule.exponential(config.baseDelay),
		Schedule.recurs(config.maxRetries),
	);

// "~" joins composite parts, so it must never survive inside one
const encodeSegment = (value: string): string =>
	encodeURIComponent(value).replace(/~/g, "%7E");

/**
 * File name for an identifier. Values are stringified, so 1 and "1"
 * address the same document.
 */
export const recordFileName = (id: Identifier): string => {
	const parts = isCompositeIdentifier(id) ? Object.values(id) : [id];
	return `${parts.map((part) => encodeSegment(String(part))).join("~")}.json`;
};

/** Where a record lives on disk. */
interface DocumentLocation {
	readonly storageName: string;
	readonly id: Identifier;
	readonly path: string;
}

const locate = (
	config: ResolvedConfig,
	storageName: string,
	operation: StorageOperation,
	id: Identifier,
): Effect.Effect<DocumentLocation, StorageError> =>
	storageName === "" || storageName === "." || storageName === ".."
		? Effect.fail(
				new StorageError({
					storageName,
					operation,
					message: `Invalid storage name '${storageName}'`,
				}),
			)
		: Effect.succeed({
				storageName,
				id,
				path: join(
					config.directory,
					encodeSegment(storageName),
					recordFileName(id),
				),
			});

const readIfExists = async (path: string): Promise<string | undefined> => {
	try {
		return await fs.readFile(path, "utf-8");
	} catch (error) {
		if (isNotFound(error)) {
			return undefined;
		}
		throw error;
	}
};

const parseRecord = (
	location: DocumentLocation,
	content: string,
): Effect.Effect<RawRecord, StorageError> =>
	Effect.try({
		try: (): unknown => JSON.parse(content),
		catch: (error) => toStorageError(location.storageName, "find", error),
	}).pipe(
		Effect.filterOrFail(Predicate.isRecord, () =>
			new StorageError({
				storageName: location.storageName,
				operation: "find",
				message: `Document at ${location.path} is not a JSON object`,
			}),
		),
	);

/**
 * Write `data` as the whole document at `location`. The document is
 * written beside its target and renamed over it; a failed attempt removes
 * its temp file before the error is retried or surfaced.
 */
const writeRecord = (
	config: ResolvedConfig,
	location: DocumentLocation,
	operation: StorageOperation,
	data: RawRecord,
): Effect.Effect<void, StorageError> =>
	Effect.try({
		try: () => `${JSON.stringify(data, null, 2)}\n`,
		catch: (error) => toStorageError(location.storageName, operation, error),
	}).pipe(
		Effect.flatMap((content) => {
			const tempPath = `${location.path}.tmp.${randomBytes(8).toString("hex")}`;
			return Effect.tryPromise({
				try: async () => {
					await fs.mkdir(dirname(location.path), {
						recursive: true,
						mode: config.dirMode,
					});
					await fs.writeFile(tempPath, content, { mode: config.fileMode });
					await fs.rename(tempPath, location.path);
				},
				catch: (error) => toStorageError(location.storageName, operation, error),
			}).pipe(
				Effect.tapError(() =>
					Effect.tryPromise(() => fs.rm(tempPath, { force: true })).pipe(
						Effect.ignore,
					),
				),
				Effect.retry(retryPolicy(config)),
			);
		}),
	);

const ensureExists = (
	location: DocumentLocation,
	operation: StorageOperation,
): Effect.Effect<void, StorageError> =>
	Effect.tryPromise({
		try: () =>
			fs.access(location.path).then(
				() => true,
				(error: unknown) => (isNotFound(error) ? false : Promise.reject(error)),
			),
		catch: (error) => toStorageError(location.storageName, operation, error),
	}).pipe(
		Effect.filterOrFail(
			(exists) => exists,
			() =>
				new StorageError({
					storageName: location.storageName,
					operation,
					message: `Record '${formatIdentifier(location.id)}' not found in '${location.storageName}'`,
				}),
		),
		Effect.asVoid,
	);

// ============================================================================
// Storage operations
// ============================================================================

const makeFind =
	(config: ResolvedConfig) =>
	(
		storageName: string,
		id: Identifier,
	): Effect.Effect<Option.Option<RawRecord>, StorageError> =>
		locate(config, storageName, "find", id).pipe(
			Effect.flatMap((location) =>
				Effect.tryPromise({
					try: () => readIfExists(location.path),
					catch: (error) => toStorageError(storageName, "find", error),
				}).pipe(
					Effect.retry(retryPolicy(config)),
					Effect.flatMap((content) =>
						content === undefined
							? Effect.succeedNone
							: parseRecord(location, content).pipe(Effect.asSome),
					),
				),
			),
		);

const makeInsert =
	(config: ResolvedConfig) =>
	(
		storageName: string,
		id: Identifier,
		data: RawRecord,
	): Effect.Effect<void, StorageError> =>
		locate(config, storageName, "insert", id).pipe(
			Effect.flatMap((location) => writeRecord(config, location, "insert", data)),
		);

const makeUpdate =
	(config: ResolvedConfig) =>
	(
		storageName: string,
		id: Identifier,
		data: RawRecord,
	): Effect.Effect<void, StorageError> =>
		locate(config, storageName, "update", id).pipe(
			Effect.tap((location) => ensureExists(location, "update")),
			Effect.flatMap((location) => writeRecord(config, location, "update", data)),
		);

const makeDelete =
	(config: ResolvedConfig) =>
	(storageName: string, id: Identifier): Effect.Effect<void, StorageError> =>
		locate(config, storageName, "delete", id).pipe(
			Effect.tap((location) => ensureExists(location, "delete")),
			Effect.flatMap((location) =>
				Effect.tryPromise({
					try: () => fs.unlink(location.path),
					catch: (error) => toStorageError(storageName, "delete", error),
				}).pipe(Effect.retry(retryPolicy(config))),
			),
		);

// ============================================================================
// Layer construction
// ============================================================================

export const makeNodeDriver = (config: NodeDriverConfig): StorageDriverShape => {
	const resolved: ResolvedConfig = { ...defaultConfig, ...config };
	return {
		supportsCompositePrimaryKeys: true,
		supportsPartialUpdates: false,
		find: makeFind(resolved),
		insert: makeInsert(resolved),
		update: makeUpdate(resolved),
		delete: makeDelete(resolved),
	};
};

/**
 * Creates a filesystem StorageDriver layer rooted at `config.directory`.
 */
export const makeNodeDriverLayer = (
	config: NodeDriverConfig,
): Layer.Layer<StorageDriver> =>
	Layer.succeed(StorageDriver, makeNodeDriver(config));
