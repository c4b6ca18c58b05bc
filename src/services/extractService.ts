import type { AxiosInstance } from 'axios';
import type { ExtractConfig, SpotifyCredentials } from '../config';
import type { ExtractResult, JsonValue } from '../models/spotifyTypes';
import { buildObjectKey } from '../utils/objectKey';
import { createSpotifyService } from './spotifyService';
import type { ObjectStore } from './storageService';

export interface ExtractDependencies {
  store: ObjectStore;
  http?: AxiosInstance;
  now?: () => Date;
}

export function serializePayload(payload: JsonValue): string {
  return JSON.stringify(payload);
}

/**
 * Authenticate, fetch the configured playlist's tracks and write the raw
 * response as a single timestamped object. Any failure propagates and
 * nothing is written.
 */
export async function extractPlaylistToStorage(
  credentials: SpotifyCredentials,
  config: ExtractConfig,
  deps: ExtractDependencies
): Promise<ExtractResult> {
  const spotify = createSpotifyService(credentials, deps.http);
  const token = await spotify.getClientCredentialsToken();

  const payload = config.fetchAllPages
    ? await spotify.getAllPlaylistTracks(token.access_token, config.playlistId)
    : await spotify.getPlaylistTracks(token.access_token, config.playlistId);

  const body = serializePayload(payload);
  const key = buildObjectKey(config.keyPrefix, deps.now ? deps.now() : new Date());

  await deps.store.put(config.bucket, key, body);

  return { bucket: config.bucket, key };
}
