/**
 * Common Zod Schemas - Shared types used across records
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Identifier Schemas
// ============================================

/**
 * Provider-assigned channel identifier (e.g., "UCxxxxxxxxxxxxxxxxxxxxxx")
 */
export const ChannelIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{2,64}$/, 'Channel id must be 2-64 URL-safe characters');

export type ChannelId = z.infer<typeof ChannelIdSchema>;

/**
 * Provider-assigned video identifier
 */
export const VideoIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{2,32}$/, 'Video id must be 2-32 URL-safe characters');

export type VideoId = z.infer<typeof VideoIdSchema>;

/**
 * Non-negative integer counter (subscribers, views, likes...)
 */
export const CounterSchema = z.number().int().nonnegative();

/**
 * `schemaVersion` field: defaults to the current version and rejects
 * records written by a newer release
 */
export function schemaVersionField(current: number) {
  return z.number().int().positive().max(current).default(current);
}
