/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the record, payload and result schemas.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  ChannelIdSchema,
  VideoIdSchema,
  CounterSchema,
  type ISO8601Timestamp,
  type ChannelId,
  type VideoId,
} from './common.js';

// ============================================================================
// Records
// ============================================================================

export {
  ChannelRecordSchema,
  ChannelReferenceMappingSchema,
  type ChannelRecord,
  type ChannelReferenceMapping,
} from './channel.js';

export { VideoRecordSchema, type VideoRecord } from './video.js';

export {
  AnalysisRecordSchema,
  AnalysisPayloadSchema,
  AnalysisHistoryEntrySchema,
  SamplingStrategySchema,
  MIN_SUMMARY_LENGTH,
  DEFAULT_CONFIDENCE,
  type AnalysisRecord,
  type AnalysisPayload,
  type AnalysisPayloadInput,
  type AnalysisHistoryEntry,
  type SamplingStrategy,
} from './analysis.js';

export { QuotaSnapshotSchema, type QuotaSnapshot } from './quota.js';

// ============================================================================
// Result
// ============================================================================

export {
  AnalysisResultSchema,
  FreshnessSchema,
  AgeLabelSchema,
  type AnalysisResult,
  type Freshness,
  type AgeLabel,
} from './result.js';

// ============================================================================
// Migrations
// ============================================================================

export { migrateSchema, atomicWriteJson } from './migrations/index.js';
