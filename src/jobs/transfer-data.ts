import { errorMessage } from '../lib/errors.ts';
import { loadTransferSettings } from '../transfer/settings.ts';
import { RunContext } from '../transfer/run-context.ts';
import { runTransfer, type TransferResult } from '../transfer/transfer-engine.ts';
import type { RuntimeDeps, SheetsPort } from '../types.ts';

export interface TransferDataJobOptions {
  /** Where SIGTERM/SIGINT are listened for; defaults to the process */
  signalTarget?: NodeJS.EventEmitter;
  now?: () => number;
}

/**
 * Scheduled job: one transfer pass from the intake sheet to the normalized list.
 * Pass failures are logged, not thrown; resolves null when the Sheets service could not be created.
 */
export async function runTransferDataJob(deps: RuntimeDeps, options: TransferDataJobOptions = {}): Promise<TransferResult | null> {
  const { config, logger } = deps;
  const context = new RunContext({ maxExecutionTime: config.maxExecutionTime, logger, ...(options.now && { now: options.now }) });
  logger.info({ maxExecutionTime: context.maxExecutionTime }, 'Starting data transfer process');

  const dispose = context.installSignalHandlers(options.signalTarget);
  try {
    const settings = await loadTransferSettings(config.transferConfigPath);

    let sheets: SheetsPort;
    try {
      sheets = deps.createSheets();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error initializing Google Sheets service');
      return null;
    }

    const result: TransferResult = await runTransfer({ sheets, logger, context, settings });
    logger.info({ outcome: result.outcome, rowsScanned: result.rowsScanned, rowsTransferred: result.rowsTransferred, rowsReconciled: result.rowsReconciled }, `Data transfer process completed in ${context.elapsedSeconds().toFixed(1)}s`);
    return result;
  } finally {
    dispose();
  }
}
