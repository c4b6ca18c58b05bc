import dotenv from 'dotenv';
import { extractPlaylistId } from './utils/playlistId';

dotenv.config();

// Spotify Web API
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';
export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';

// Global Top 50
export const DEFAULT_PLAYLIST_URL =
  'https://open.spotify.com/playlist/37i9dQZEVXbNG2KDcFcKOF?si=1333723a6eff4b7f';
export const DEFAULT_BUCKET = 'spotify-etl-project-tasneem';
export const DEFAULT_KEY_PREFIX = 'raw_data/to_processed/';
export const DEFAULT_PORT = 5000;
// HTTP trigger is unauthenticated; loopback unless HOST is set
export const DEFAULT_HOST = '127.0.0.1';

export type Env = NodeJS.ProcessEnv;

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
}

export interface ExtractConfig {
  playlistId: string;
  bucket: string;
  keyPrefix: string;
  /** Follow `next` links instead of stopping at the first page */
  fetchAllPages: boolean;
}

export type StorageBackend = 's3' | 'firebase';

/**
 * Read the Spotify app credentials. Missing values come back as empty strings
 * and are rejected by the token endpoint, not here.
 */
export function loadCredentials(env: Env = process.env): SpotifyCredentials {
  return {
    clientId: env.client_id || '',
    clientSecret: env.client_secret || '',
  };
}

export function loadExtractConfig(env: Env = process.env): ExtractConfig {
  return {
    playlistId: env.PLAYLIST_ID || extractPlaylistId(env.PLAYLIST_URL || DEFAULT_PLAYLIST_URL),
    bucket: env.BUCKET_NAME || DEFAULT_BUCKET,
    keyPrefix: env.KEY_PREFIX ?? DEFAULT_KEY_PREFIX,
    fetchAllPages: env.FETCH_ALL_PAGES === 'true',
  };
}

export function loadStorageBackend(env: Env = process.env): StorageBackend {
  const backend = env.STORAGE_BACKEND || 's3';

  if (backend !== 's3' && backend !== 'firebase') {
    throw new Error(`Unknown STORAGE_BACKEND: ${backend}`);
  }

  return backend;
}

export function loadPort(env: Env = process.env): number {
  return Number(env.PORT) || DEFAULT_PORT;
}

export function loadHost(env: Env = process.env): string {
  return env.HOST || DEFAULT_HOST;
}
