import type { Server } from 'http';
import { createApp } from '../api/app.ts';
import type { RuntimeOverrides, ServerConfig } from '../types.ts';
import { createDefaultRuntime } from './runtime.ts';

export async function createHTTPServer(config: ServerConfig, overrides?: RuntimeOverrides) {
  const runtime = createDefaultRuntime(config, overrides);
  const { logger } = runtime;
  const app = createApp(runtime);

  logger.info(`Starting ${config.name} (http)`);
  const httpServer = await new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve(server));
    server.once('error', reject);
  });
  logger.info({ port: config.port }, 'http transport ready');

  return {
    app,
    httpServer,
    logger,
    close: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
