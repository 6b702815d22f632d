/**
 * @geoengine-ts/types
 *
 * Shared types of the Geo Engine client.
 *
 * - Geo: bounds, resolution, spatial references, colors
 * - Time: intervals and steps
 * - Descriptors: what a workflow produces
 * - Workflow / Dataset / Session: API payloads
 * - Features: GeoJSON with time
 */

export * from "./geo.js";
export * from "./time.js";
export * from "./descriptors.js";
export * from "./workflow.js";
export * from "./dataset.js";
export * from "./session.js";
export * from "./features.js";
