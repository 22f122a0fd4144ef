/**
 * Channel Reference Parsing
 *
 * Turns free-form user input (channel id, @handle or any of the YouTube
 * channel URL shapes) into a typed reference. Only `id` references are
 * final; the others need one provider lookup to become a channel id.
 *
 * @module youtube/identifier
 */

// ============================================================================
// Types
// ============================================================================

export type ChannelReference =
  | { kind: 'id'; value: string }
  /** Handle without the leading "@", lower-cased */
  | { kind: 'handle'; value: string }
  /** Legacy /user/ name */
  | { kind: 'username'; value: string }
  /** Legacy /c/ custom URL name, resolvable only through search */
  | { kind: 'custom'; value: string };

// ============================================================================
// Constants
// ============================================================================

/** Provider channel ids: "UC" followed by 22 URL-safe characters */
export const CHANNEL_ID_PATTERN = /^UC[A-Za-z0-9_-]{22}$/;

const HANDLE_PATTERN = /^@?([\p{L}\p{N}._-]{3,30})$/u;
const NAME_PATTERN = /^[\p{L}\p{N}._-]{1,100}$/u;

const YOUTUBE_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com']);

/** Top-level paths that are never a legacy custom channel name */
const RESERVED_PATHS = new Set([
  'watch',
  'playlist',
  'results',
  'feed',
  'shorts',
  'live',
  'embed',
  'hashtag',
  'gaming',
  'premium',
  'account',
  'redirect',
]);

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a channel reference.
 *
 * @returns null when the input is not recognisable as a channel
 *
 * @example
 * parseChannelReference('https://www.youtube.com/@SomeCreator/videos');
 * // { kind: 'handle', value: 'somecreator' }
 */
export function parseChannelReference(input: string): ChannelReference | null {
  const trimmed = input.trim();
  if (trimmed === '') {
    return null;
  }

  if (CHANNEL_ID_PATTERN.test(trimmed)) {
    return { kind: 'id', value: trimmed };
  }

  if (trimmed.startsWith('@')) {
    return parseHandle(trimmed);
  }

  const url = toUrl(trimmed);
  if (!url || !YOUTUBE_HOSTS.has(url.hostname.toLowerCase())) {
    return null;
  }
  return parsePath(url.pathname);
}

/**
 * Stable text form of a reference, e.g. "handle:somecreator"
 */
export function formatChannelReference(reference: ChannelReference): string {
  return `${reference.kind}:${reference.value}`;
}

// ============================================================================
// Helper Functions
// ============================================================================

function parseHandle(segment: string): ChannelReference | null {
  const match = HANDLE_PATTERN.exec(segment);
  const handle = match?.[1];
  return handle ? { kind: 'handle', value: handle.toLowerCase() } : null;
}

function parsePath(pathname: string): ChannelReference | null {
  const segments = pathname
    .split('/')
    .filter((segment) => segment !== '')
    .map(safeDecode);
  const [first, second] = segments;
  if (first === undefined) {
    return null;
  }

  if (first.startsWith('@')) {
    return parseHandle(first);
  }

  switch (first.toLowerCase()) {
    case 'channel':
      return second !== undefined && CHANNEL_ID_PATTERN.test(second)
        ? { kind: 'id', value: second }
        : null;
    case 'user':
      return second !== undefined && NAME_PATTERN.test(second)
        ? { kind: 'username', value: second }
        : null;
    case 'c':
      return second !== undefined && NAME_PATTERN.test(second)
        ? { kind: 'custom', value: second }
        : null;
  }

  if (segments.length === 1 && !RESERVED_PATHS.has(first.toLowerCase()) && NAME_PATTERN.test(first)) {
    return { kind: 'custom', value: first };
  }
  return null;
}

function toUrl(input: string): URL | null {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `https://${input}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
