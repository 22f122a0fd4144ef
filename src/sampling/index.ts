/**
 * Sampling Module
 *
 * @module sampling
 */

export {
  sampleVideos,
  selectStrategy,
  DEFAULT_MAX_SAMPLE,
  SMALL_CHANNEL_THRESHOLD,
  LARGE_CHANNEL_THRESHOLD,
  type SampleableVideo,
  type SampleResult,
} from './sampler.js';
