import type { AxiosInstance } from 'axios';
import { loadCredentials, loadExtractConfig, loadStorageBackend } from './config';
import type { Env } from './config';
import type { ExtractResult } from './models/spotifyTypes';
import { extractPlaylistToStorage } from './services/extractService';
import { createObjectStore } from './services/storageService';
import type { ObjectStore } from './services/storageService';

export interface HandlerDependencies {
  env?: Env;
  store?: ObjectStore;
  http?: AxiosInstance;
  now?: () => Date;
}

/** Run one extract with credentials and settings read from the environment. */
export async function runExtractFromEnv(deps: HandlerDependencies = {}): Promise<ExtractResult> {
  const env = deps.env ?? process.env;
  const store = deps.store ?? createObjectStore(loadStorageBackend(env), env);

  return extractPlaylistToStorage(loadCredentials(env), loadExtractConfig(env), {
    store,
    http: deps.http,
    now: deps.now
  });
}

export function createHandler(deps: HandlerDependencies = {}) {
  // event and context come from the scheduler and are not used
  return async (_event: unknown, _context: unknown): Promise<void> => {
    const { bucket, key } = await runExtractFromEnv(deps);
    console.log(`Playlist extract stored at ${bucket}/${key}`);
  };
}

export const handler = createHandler();
