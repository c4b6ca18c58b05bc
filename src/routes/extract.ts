import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ExtractResult } from '../models/spotifyTypes';

export type RunExtract = () => Promise<ExtractResult>;

export function createExtractRouter(runExtract: RunExtract): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // Manual / HTTP-scheduled trigger for the same job the Lambda handler runs.
  // Unauthenticated: anyone who can reach the port can start an extract.
  router.post('/extract', async (_req: Request, res: Response) => {
    try {
      const result = await runExtract();
      res.json(result);
    } catch (error) {
      console.error('Error running playlist extract:', error);
      res.status(500).json({ error: 'Failed to extract playlist' });
    }
  });

  return router;
}
