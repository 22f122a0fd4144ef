/**
 * YouTube Module
 *
 * @module youtube
 */

export {
  YouTubeClient,
  MAX_BATCH_SIZE,
  deriveUploadsPlaylistId,
  parseDuration,
  formatDuration,
  type YouTubeApi,
  type YouTubeClientOptions,
  type YouTubeChannel,
  type PlaylistVideo,
  type PlaylistPage,
  type VideoDetails,
} from './client.js';

export {
  parseChannelReference,
  formatChannelReference,
  CHANNEL_ID_PATTERN,
  type ChannelReference,
} from './identifier.js';
