/**
 * Tests for channel reference parsing
 *
 * @module youtube/identifier.test
 */

import { describe, it, expect } from '@jest/globals';
import { parseChannelReference, formatChannelReference } from './identifier.js';

const CHANNEL_ID = 'UCabcdefghijklmnopqrstuv';

describe('parseChannelReference', () => {
  it('should accept a raw channel id', () => {
    expect(parseChannelReference(CHANNEL_ID)).toEqual({ kind: 'id', value: CHANNEL_ID });
    expect(parseChannelReference(`  ${CHANNEL_ID}\n`)).toEqual({ kind: 'id', value: CHANNEL_ID });
  });

  it('should accept /channel/ URLs with or without scheme', () => {
    const expected = { kind: 'id', value: CHANNEL_ID };
    expect(parseChannelReference(`https://www.youtube.com/channel/${CHANNEL_ID}`)).toEqual(expected);
    expect(parseChannelReference(`youtube.com/channel/${CHANNEL_ID}/videos`)).toEqual(expected);
    expect(parseChannelReference(`https://m.youtube.com/channel/${CHANNEL_ID}?si=x`)).toEqual(
      expected
    );
  });

  it('should accept handles as bare @names and URLs', () => {
    const expected = { kind: 'handle', value: 'somecreator' };
    expect(parseChannelReference('@SomeCreator')).toEqual(expected);
    expect(parseChannelReference('https://www.youtube.com/@SomeCreator')).toEqual(expected);
    expect(parseChannelReference('youtube.com/@somecreator/videos')).toEqual(expected);
  });

  it('should accept legacy /user/ and /c/ URLs', () => {
    expect(parseChannelReference('https://www.youtube.com/user/OldName')).toEqual({
      kind: 'username',
      value: 'OldName',
    });
    expect(parseChannelReference('https://www.youtube.com/c/CustomName')).toEqual({
      kind: 'custom',
      value: 'CustomName',
    });
    expect(parseChannelReference('https://www.youtube.com/CustomName')).toEqual({
      kind: 'custom',
      value: 'CustomName',
    });
  });

  it('should reject non-channel input', () => {
    expect(parseChannelReference('')).toBeNull();
    expect(parseChannelReference('   ')).toBeNull();
    expect(parseChannelReference('https://www.youtube.com/watch?v=abc123')).toBeNull();
    expect(parseChannelReference('https://example.com/@someone')).toBeNull();
    expect(parseChannelReference('https://www.youtube.com/channel/not-an-id')).toBeNull();
    expect(parseChannelReference('@ab')).toBeNull();
    expect(parseChannelReference('just some words')).toBeNull();
  });
});

describe('formatChannelReference', () => {
  it('should prefix the kind', () => {
    expect(formatChannelReference({ kind: 'handle', value: 'someone' })).toBe('handle:someone');
  });
});
