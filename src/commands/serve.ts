/**
 * Serve Command
 *
 * Loads the governance policy, starts the governor loops and the HTTP
 * control surface, and stops both on SIGINT/SIGTERM.
 */
import { createApp, startServer } from '../api/server';
import { OpenAICompatibleModelBackend } from '../integrations/model-backend/client';
import { loadPolicy } from '../policy/loader';
import { Governor } from '../runtime/governor';
import { GovernorConfig } from '../utils/config';
import { ConfigurationError } from '../utils/errors';
import logger from '../utils/logger';

export interface ServeOptions {
  port?: string;
  policy?: string;
}

export async function serve(config: GovernorConfig, options: ServeOptions = {}): Promise<void> {
  const { url, apiKey, timeoutMs, model } = config.modelBackend;
  if (!url) {
    throw new ConfigurationError('MODEL_BACKEND_URL must be set to serve tasks');
  }

  const port = options.port === undefined ? config.service.port : Number.parseInt(options.port, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port '${options.port}'`);
  }

  const policy = loadPolicy(options.policy ?? config.policy.path);
  const governor = new Governor({
    policy,
    settings: config,
    model: new OpenAICompatibleModelBackend({ baseUrl: url, apiKey, timeoutMs, model }),
  });

  governor.start();
  const app = createApp(governor, {
    service: config.service,
    exposeInternalErrors: config.service.environment !== 'prod',
  });
  const server = await startServer(app, port);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    governor.stop();
    server.close((error) => {
      if (error) {
        logger.error({ error: error.message }, 'HTTP server did not close cleanly');
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
