/**
 * Version constants for serialization boundaries and persisted snapshots.
 */

/**
 * Core package semantic version.
 *
 * IMPORTANT: This must stay in sync with packages/core/package.json version.
 */
export const CORE_VERSION = '0.1.0';

/**
 * Schema version of persisted registry snapshots.
 *
 * Increment when the snapshot payload changes in a backwards-incompatible way.
 *
 * Current schema (v1):
 * - version: 1
 * - savedAt: epoch milliseconds
 * - boards: { field: base64, currentHeight: number, previousHeight: number }[]
 */
export const REGISTRY_SNAPSHOT_SCHEMA_VERSION = 1;
