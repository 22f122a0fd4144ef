/**
 * Metadata Module
 *
 * @module metadata
 */

export { MetadataFetcher, type MetadataFetcherOptions } from './fetcher.js';
