import { errorMessage, isAuthError } from '../lib/errors.ts';
import { formatSheetTimestamp } from '../lib/time.ts';
import { columnLetter } from '../spreadsheet/column-utilities.ts';
import { cellAddress } from '../spreadsheet/range-operations.ts';
import type { Cell, Logger, Row, SheetsPort } from '../types.ts';
import { type ColumnMap, cellText, mapColumns } from './column-mapper.ts';
import { generateRowId } from './row-identity.ts';
import type { RunContext } from './run-context.ts';
import { resolveTransferSettings, type TransferSettings } from './settings.ts';

export type TransferOutcome = 'completed' | 'stopped' | 'header-drift' | 'empty-source' | 'empty-target' | 'failed';

export interface TransferResult {
  outcome: TransferOutcome;
  rowsScanned: number;
  rowsTransferred: number;
  /** Rows whose id was already in the target; marked added without a second append */
  rowsReconciled: number;
  elapsedSeconds: number;
  error?: string;
}

export interface TransferDeps {
  sheets: SheetsPort;
  logger: Logger;
  context: RunContext;
  settings?: TransferSettings;
}

export interface TargetRowValues {
  width: number;
  fieldMapping: Record<string, string>;
  rowId: string;
  addedDate: string;
  status: string;
}

/** Width of a target row: one past the highest mapped column. */
export function targetRowWidth(targetMap: ColumnMap, defaultWidth: number): number {
  const indices = Object.values(targetMap);
  return indices.length > 0 ? Math.max(...indices) + 1 : defaultWidth;
}

export function buildTargetRow(row: Row, sourceMap: ColumnMap, targetMap: ColumnMap, values: TargetRowValues): Row {
  const target: Row = new Array<Cell>(values.width).fill('');

  for (const [targetField, sourceField] of Object.entries(values.fieldMapping)) {
    const sourceIndex = sourceMap[sourceField];
    const targetIndex = targetMap[targetField];
    if (sourceIndex !== undefined && targetIndex !== undefined && row.length > sourceIndex) {
      target[targetIndex] = row[sourceIndex] ?? '';
    }
  }

  if (targetMap.added_date !== undefined) target[targetMap.added_date] = values.addedDate;
  if (targetMap.status !== undefined) target[targetMap.status] = values.status;
  if (targetMap.id !== undefined) target[targetMap.id] = values.rowId;

  return target;
}

/**
 * Re-read a sheet's header row and compare it with the snapshot taken at the start of the run.
 * A failed read counts as a change.
 */
export async function verifyHeadersUnchanged(sheets: SheetsPort, sheetName: string, originalHeaders: Row, lastColumn: string, logger: Logger): Promise<boolean> {
  try {
    const data = await sheets.getValues({ sheetName, startCell: 'A1', endCell: `${lastColumn}1` });
    const currentHeaders = data.values[0];

    if (!currentHeaders) {
      logger.warn({ sheetName }, 'Could not retrieve current headers');
      return false;
    }

    if (currentHeaders.length !== originalHeaders.length) {
      logger.warn({ sheetName, before: originalHeaders.length, after: currentHeaders.length }, 'Header count changed');
      return false;
    }

    for (let i = 0; i < originalHeaders.length; i++) {
      if (originalHeaders[i] !== currentHeaders[i]) {
        logger.warn({ sheetName, position: i, before: originalHeaders[i], after: currentHeaders[i] }, 'Header changed');
        return false;
      }
    }
    return true;
  } catch (error) {
    logger.error({ sheetName, error: errorMessage(error) }, 'Error verifying headers');
    return false;
  }
}

interface PendingBatch {
  targetRows: Row[];
  cellWrites: Record<string, Row[]>;
  staged: number;
}

/**
 * Moves rows that are not yet marked added from the intake sheet to the normalized sheet.
 *
 * Progress is durable only at flushes: the target append goes first, then one batch
 * write of the new ids and added flags. Anything that ends the row loop flushes before it returns.
 */
export class TransferEngine {
  private readonly sheets: SheetsPort;
  private readonly logger: Logger;
  private readonly context: RunContext;
  private readonly settings: TransferSettings;
  private pending: PendingBatch = { targetRows: [], cellWrites: {}, staged: 0 };
  private nextTargetRow = 1;
  private rowsScanned = 0;
  private rowsTransferred = 0;
  private rowsReconciled = 0;

  constructor(deps: TransferDeps) {
    this.sheets = deps.sheets;
    this.logger = deps.logger;
    this.context = deps.context;
    this.settings = deps.settings ?? resolveTransferSettings();
  }

  async run(): Promise<TransferResult> {
    const { sourceSheet, targetSheet, maxRows, maxColumns, batchSize, headerCheckInterval } = this.settings;
    const lastColumn = columnLetter(maxColumns - 1);

    const source = await this.sheets.getValues({ sheetName: sourceSheet, startCell: 'A1', endCell: `${lastColumn}${maxRows}` });
    const sourceHeaders = source.values[0];
    if (!sourceHeaders) {
      this.logger.warn({ sheetName: sourceSheet }, 'No data found in source sheet');
      return this.result('empty-source');
    }
    const sourceMap = mapColumns(sourceHeaders, this.settings.sourceColumns, this.logger);

    const target = await this.sheets.getValues({ sheetName: targetSheet, startCell: 'A1', endCell: `${lastColumn}${maxRows}` });
    const targetHeaders = target.values[0];
    if (!targetHeaders) {
      this.logger.warn({ sheetName: targetSheet }, 'No data found in target sheet');
      return this.result('empty-target');
    }
    const targetMap = mapColumns(targetHeaders, this.settings.targetColumns, this.logger);

    const originalSourceHeaders = [...sourceHeaders];
    const originalTargetHeaders = [...targetHeaders];
    const width = targetRowWidth(targetMap, this.settings.defaultTargetWidth);
    const knownIds = collectIds(target.values, targetMap);
    this.nextTargetRow = target.values.length + 1;

    if (sourceMap.added === undefined) {
      this.logger.warn({ sheetName: sourceSheet }, 'Source sheet has no added column; transferred rows cannot be marked');
    }

    const dataRows = source.values.slice(1);
    for (let index = 0; index < dataRows.length; index++) {
      if (this.context.shouldStop() && this.rowsScanned > 0) {
        this.logger.info({ reason: this.context.stopReason, rowsScanned: this.rowsScanned }, 'Exiting early, flushing pending work');
        await this.flush();
        return this.result('stopped');
      }

      this.rowsScanned++;
      const row = [...(dataRows[index] ?? [])];
      // Header is sheet row 1
      const sheetRow = index + 2;

      if (this.isAdded(row, sourceMap)) continue;

      if (this.rowsScanned % headerCheckInterval === 0) {
        const sourceHeadersOk = await verifyHeadersUnchanged(this.sheets, sourceSheet, originalSourceHeaders, lastColumn, this.logger);
        const targetHeadersOk = await verifyHeadersUnchanged(this.sheets, targetSheet, originalTargetHeaders, lastColumn, this.logger);
        if (!sourceHeadersOk || !targetHeadersOk) {
          this.logger.error('Headers changed during processing. Aborting to prevent data corruption.');
          await this.flush();
          return this.result('header-drift');
        }
      }

      this.stageRow(row, sheetRow, sourceMap, targetMap, width, knownIds);

      if (this.pending.staged >= batchSize) {
        await this.flush();
      }
    }

    await this.flush();
    this.logger.info({ rowsScanned: this.rowsScanned, rowsTransferred: this.rowsTransferred, rowsReconciled: this.rowsReconciled }, 'Transfer pass finished');
    return this.result('completed');
  }

  result(outcome: TransferOutcome, error?: string): TransferResult {
    return {
      outcome,
      rowsScanned: this.rowsScanned,
      rowsTransferred: this.rowsTransferred,
      rowsReconciled: this.rowsReconciled,
      elapsedSeconds: this.context.elapsedSeconds(),
      ...(error !== undefined && { error }),
    };
  }

  private isAdded(row: Row, sourceMap: ColumnMap): boolean {
    const index = sourceMap.added;
    if (index === undefined) return false;
    return cellText(row[index]).toUpperCase() === this.settings.addedMarker.toUpperCase();
  }

  private stageRow(row: Row, sheetRow: number, sourceMap: ColumnMap, targetMap: ColumnMap, width: number, knownIds: Set<string>): void {
    const { sourceSheet } = this.settings;
    const idIndex = sourceMap.id;
    const hadId = idIndex !== undefined && cellText(row[idIndex]) !== '';
    const rowId = generateRowId(row, sourceMap);

    if (idIndex !== undefined && !hadId) {
      this.pending.cellWrites[cellAddress(sourceSheet, idIndex, sheetRow)] = [[rowId]];
      while (row.length <= idIndex) row.push('');
      row[idIndex] = rowId;
    }

    if (knownIds.has(rowId)) {
      this.rowsReconciled++;
      this.logger.info({ rowId, sheetRow }, 'Row already present in target, marking as added only');
    } else {
      this.pending.targetRows.push(
        buildTargetRow(row, sourceMap, targetMap, {
          width,
          fieldMapping: this.settings.fieldMapping,
          rowId,
          addedDate: formatSheetTimestamp(this.context.currentTime()),
          status: this.settings.pendingStatus,
        })
      );
    }

    if (sourceMap.added !== undefined) {
      this.pending.cellWrites[cellAddress(sourceSheet, sourceMap.added, sheetRow)] = [[this.settings.addedMarker]];
    }
    this.pending.staged++;
  }

  private async flush(): Promise<void> {
    const { targetRows, cellWrites } = this.pending;

    if (targetRows.length > 0) {
      const startRow = this.nextTargetRow;
      this.logger.info({ startRow }, 'Appending at row');
      const appended = await this.sheets.appendValues({
        range: { sheetName: this.settings.targetSheet, startCell: `A${startRow}` },
        values: targetRows,
        valueInputOption: 'USER_ENTERED',
      });
      this.logger.info({ rows: targetRows.length, range: appended.appendedRange }, 'Batch appended rows to target sheet');
      this.rowsTransferred += targetRows.length;
      this.nextTargetRow += targetRows.length;
    }

    const cellCount = Object.keys(cellWrites).length;
    if (cellCount > 0) {
      await this.sheets.batchUpdateValues(cellWrites, 'USER_ENTERED');
      this.logger.info({ cells: cellCount }, 'Batch updated cells in source sheet');
    }

    this.pending = { targetRows: [], cellWrites: {}, staged: 0 };
  }
}

function collectIds(rows: Row[], columnMap: ColumnMap): Set<string> {
  const ids = new Set<string>();
  const index = columnMap.id;
  if (index === undefined) return ids;
  for (const row of rows.slice(1)) {
    const id = cellText(row[index]);
    if (id) ids.add(id);
  }
  return ids;
}

/**
 * One transfer pass. Never throws: failures are logged and reported in the result,
 * and the next scheduled pass picks up from the flags already written.
 */
export async function runTransfer(deps: TransferDeps): Promise<TransferResult> {
  const engine = new TransferEngine(deps);
  try {
    return await engine.run();
  } catch (error) {
    const message = errorMessage(error);
    if (isAuthError(error)) {
      deps.logger.error({ error: message }, 'Authentication error');
    } else {
      deps.logger.error({ error: message }, 'Error processing spreadsheet data');
    }
    return engine.result('failed', message);
  }
}
