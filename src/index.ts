import { createConfig, handleVersionHelp } from './setup/config.ts';
import { createHTTPServer } from './setup/http.ts';
import type { ServerConfig } from './types.ts';

export { SHEETS_SCOPE } from './constants.ts';
export * as jobs from './jobs/index.ts';
export * as schemas from './schemas/index.ts';
export * as setup from './setup/index.ts';
export { GoogleSheetsService } from './spreadsheet/sheets-service.ts';
export * as transfer from './transfer/index.ts';
export * from './types.ts';

export async function startServer(config: ServerConfig): Promise<void> {
  const { logger, close } = await createHTTPServer(config);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info(`Server started on port ${config.port}`);
}

export default async function main(): Promise<void> {
  // Check for help/version flags FIRST, before config parsing
  const versionHelpResult = handleVersionHelp(process.argv.slice(2));
  if (versionHelpResult.handled) {
    console.log(versionHelpResult.output);
    process.exit(0);
  }

  // Only parse config if no help/version flags
  const config = createConfig();
  await startServer(config);
}

if (process.argv[1] === new URL(import.meta.url).pathname) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
