import express from 'express';
import type { Express } from 'express';
import { createExtractRouter } from './routes/extract';
import type { RunExtract } from './routes/extract';

export interface AppDependencies {
  runExtract: RunExtract;
}

export function createApp({ runExtract }: AppDependencies): Express {
  const app = express();

  app.use(express.json());
  app.use('/api', createExtractRouter(runExtract));

  return app;
}
