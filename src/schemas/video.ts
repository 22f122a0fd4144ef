/**
 * Video Schema
 *
 * A video starts as playlist metadata (title, description, publish time)
 * and is enriched with statistics and content details by a videos.list
 * call. Videos whose detail batch failed keep `hasDetails: false`.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  ChannelIdSchema,
  CounterSchema,
  ISO8601TimestampSchema,
  VideoIdSchema,
  schemaVersionField,
} from './common.js';

export const VideoRecordSchema = z.object({
  schemaVersion: schemaVersionField(SCHEMA_VERSIONS.video),
  videoId: VideoIdSchema,
  channelId: ChannelIdSchema,
  title: z.string(),
  description: z.string(),
  publishedAt: ISO8601TimestampSchema,
  thumbnailUrl: z.string().nullable(),

  // Detail fields (null until enriched)
  viewCount: CounterSchema.nullable(),
  likeCount: CounterSchema.nullable(),
  commentCount: CounterSchema.nullable(),
  /** ISO8601 duration, e.g. "PT15M33S" */
  duration: z.string().nullable(),
  tags: z.array(z.string()),
  categoryId: z.string().nullable(),

  /** False when the detail fetch failed and only playlist metadata is known */
  hasDetails: z.boolean(),
  fetchedAt: ISO8601TimestampSchema,
});

export type VideoRecord = z.infer<typeof VideoRecordSchema>;
