import 'dotenv/config';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { createFetcher } from './retrieval/fetcher';
import { createApp } from './app';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  allowedOrigins: config.server.allowedOrigins,
  unfurl: {
    timeoutMs: config.unfurl.timeoutMs,
    maxContentLength: config.unfurl.maxContentLength,
    blockPrivateHosts: config.unfurl.blockPrivateHosts,
  },
});

const fetcher = createFetcher(config.unfurl);
const app = createApp({ config, logger, fetcher });

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
