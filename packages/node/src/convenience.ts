/**
 * Convenience wrapper that wires the filesystem driver under an entity
 * manager, so applications only hand over their mapping and a directory.
 */

import {
	type ClassMetadata,
	type EntityManager,
	type MappingError,
	makeEntityManagerLayer,
	type UnitOfWorkConfig,
} from "@stowage/core";
import { Layer } from "effect";
import { makeNodeDriverLayer, type NodeDriverConfig } from "./node-driver-layer.js";

/**
 * Build an EntityManager layer persisting to the filesystem.
 *
 * @param metadata - Every entity and embeddable the application maps
 * @param driverConfig - Root directory and write tuning for the driver
 * @param unitOfWorkConfig - Optional identifier converter
 * @returns A Layer providing EntityManager, failing with MappingError on an invalid mapping
 */
export const makeNodeEntityManagerLayer = (
	metadata: ReadonlyArray<ClassMetadata>,
	driverConfig: NodeDriverConfig,
	unitOfWorkConfig?: UnitOfWorkConfig,
): Layer.Layer<EntityManager, MappingError> =>
	makeEntityManagerLayer(metadata, unitOfWorkConfig).pipe(
		Layer.provide(makeNodeDriverLayer(driverConfig)),
	);
