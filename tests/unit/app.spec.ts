import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../../src/app';
import type { RunExtract } from '../../src/routes/extract';

let server: Server | undefined;

async function start(runExtract: RunExtract): Promise<string> {
  const app = createApp({ runExtract });

  return new Promise((resolve, reject) => {
    const listening = app.listen(0, '127.0.0.1', () => {
      const address = listening.address();
      if (address && typeof address === 'object') {
        resolve(`http://127.0.0.1:${address.port}`);
      } else {
        reject(new Error('Server did not bind to a TCP port'));
      }
    });
    server = listening;
  });
}

describe('HTTP trigger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    server = undefined;
  });

  it('reports health', async () => {
    const baseUrl = await start(async () => ({ bucket: 'b', key: 'k' }));

    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('runs the extract and returns where it was stored', async () => {
    const runExtract = vi.fn(async () => ({ bucket: 'test-bucket', key: 'raw_data/to_processed/spotify_raw_x.json' }));
    const baseUrl = await start(runExtract);

    const response = await fetch(`${baseUrl}/api/extract`, { method: 'POST' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ bucket: 'test-bucket', key: 'raw_data/to_processed/spotify_raw_x.json' });
    expect(runExtract).toHaveBeenCalledTimes(1);
  });

  it('answers 500 when the extract fails', async () => {
    const baseUrl = await start(async () => {
      throw new Error('Request failed with status code 503');
    });

    const response = await fetch(`${baseUrl}/api/extract`, { method: 'POST' });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Failed to extract playlist' });
  });
});
