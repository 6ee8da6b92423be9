export { type ColumnMap, cellText, fieldValue, mapColumns, stripParentheses } from './column-mapper.ts';
export { createShortHash, generateRowId, ROW_ID_LENGTH } from './row-identity.ts';
export { RunContext, type RunContextOptions, type StopReason } from './run-context.ts';
export { DEFAULT_TRANSFER_SETTINGS, loadTransferSettings, resolveTransferSettings, type TransferSettings } from './settings.ts';
export { buildTargetRow, runTransfer, TransferEngine, type TransferDeps, type TransferOutcome, type TransferResult, targetRowWidth, verifyHeadersUnchanged } from './transfer-engine.ts';
