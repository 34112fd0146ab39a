/**
 * @stowage/node - Node.js adapter for Stowage
 *
 * Re-exports everything from @stowage/core plus the filesystem storage driver.
 */

// Re-export everything from core
export * from "@stowage/core";
// Convenience wrapper (no manual layer wiring)
export { makeNodeEntityManagerLayer } from "./convenience.js";
export type { NodeDriverConfig } from "./node-driver-layer.js";
// Export Node.js storage driver
export {
	makeNodeDriver,
	makeNodeDriverLayer,
	recordFileName,
} from "./node-driver-layer.js";
