/**
 * Channel Schema
 *
 * Snapshot of a channel's display attributes and counters as reported by
 * the YouTube Data API. Refreshed only by the metadata fetcher.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  ChannelIdSchema,
  CounterSchema,
  ISO8601TimestampSchema,
  schemaVersionField,
} from './common.js';

export const ChannelRecordSchema = z.object({
  schemaVersion: schemaVersionField(SCHEMA_VERSIONS.channel),
  channelId: ChannelIdSchema,
  title: z.string(),
  description: z.string(),
  customUrl: z.string().nullable(),
  country: z.string().nullable(),
  /** When the channel was created upstream */
  publishedAt: ISO8601TimestampSchema.nullable(),
  thumbnailUrl: z.string().nullable(),
  subscriberCount: CounterSchema,
  videoCount: CounterSchema,
  viewCount: CounterSchema,
  /** Uploads playlist used to enumerate the channel's videos */
  uploadsPlaylistId: z.string().min(1),
  fetchedAt: ISO8601TimestampSchema,
});

export type ChannelRecord = z.infer<typeof ChannelRecordSchema>;

/**
 * A free-form reference (handle, legacy username, custom name) and the
 * channel id it resolved to. Stored so read-only lookups never need the
 * provider to map a reference they have seen before.
 */
export const ChannelReferenceMappingSchema = z.object({
  /** Normalised form, e.g. "handle:somecreator" */
  reference: z.string().min(1),
  channelId: ChannelIdSchema,
  resolvedAt: ISO8601TimestampSchema,
});

export type ChannelReferenceMapping = z.infer<typeof ChannelReferenceMappingSchema>;
