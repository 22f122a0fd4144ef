/**
 * Schema Version Registry
 *
 * All persisted schemas include a schemaVersion field for migration support.
 * Each schema type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all persisted data types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Channel metadata snapshot */
  channel: 1,
  /** Video metadata (optionally enriched with details) */
  video: 1,
  /** Channel analysis result */
  analysis: 1,
  /** Quota ledger snapshot */
  quota: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;
