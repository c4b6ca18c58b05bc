/**
 * Pull the playlist id out of a share link such as
 * `https://open.spotify.com/playlist/<id>?si=...`: the text after the last
 * "/" and before the first "?" that follows it.
 */
export function extractPlaylistId(playlistUrl: string): string {
  const lastSegment = playlistUrl.slice(playlistUrl.lastIndexOf('/') + 1);
  const queryStart = lastSegment.indexOf('?');

  return queryStart === -1 ? lastSegment : lastSegment.slice(0, queryStart);
}
