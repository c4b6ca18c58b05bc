import { createApp } from './app';
import { loadHost, loadPort } from './config';
import { runExtractFromEnv } from './handler';

const app = createApp({ runExtract: () => runExtractFromEnv() });
const PORT = loadPort();
const HOST = loadHost();

app.listen(PORT, HOST, () => {
  console.log(`Server is running on ${HOST}:${PORT}`);
});
