import { describe, expect, it } from 'vitest';
import { DEFAULT_PLAYLIST_URL } from '../../src/config';
import { extractPlaylistId } from '../../src/utils/playlistId';

describe('extractPlaylistId', () => {
  it('takes the segment between the last slash and the query string', () => {
    expect(extractPlaylistId(DEFAULT_PLAYLIST_URL)).toBe('37i9dQZEVXbNG2KDcFcKOF');
  });

  it('returns the whole last segment when there is no query string', () => {
    expect(extractPlaylistId('https://open.spotify.com/playlist/5ABHKGoOzxkaa28ttQV9sE')).toBe('5ABHKGoOzxkaa28ttQV9sE');
  });

  it('stops at the first question mark of the last segment', () => {
    expect(extractPlaylistId('https://open.spotify.com/playlist/abc123?si=x?y=z')).toBe('abc123');
  });
});
