export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

// The playlist payload is stored as-is, so it is only typed as JSON.
export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One page from `GET /playlists/{id}/tracks`. Only the paging fields are
 * read; everything else passes through untouched.
 */
export type PlaylistTracksPage = JsonObject;

export interface ExtractResult {
  bucket: string;
  key: string;
}
