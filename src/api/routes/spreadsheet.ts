import { type Request, type Response, Router } from 'express';
import { errorMessage, HttpError, SheetsApiError } from '../../lib/errors.ts';
import { AppendRequestSchema, SheetRangeSchema, toSheetRange, UpdateRequestSchema } from '../../schemas/index.ts';
import type { SheetData, SheetsPort } from '../../types.ts';
import { asyncHandler } from '../async-handler.ts';

export interface SpreadsheetDeps {
  createSheets: () => SheetsPort;
}

export interface UpdateResult {
  updated_cells: number;
  updated_range: string;
}

export interface AppendResult {
  appended_cells: number;
  appended_range: string;
}

function sheetsFrom(deps: SpreadsheetDeps): SheetsPort {
  try {
    return deps.createSheets();
  } catch (error) {
    throw new HttpError(500, `Google Sheets service error: ${errorMessage(error)}`, { cause: error });
  }
}

async function callSheets<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof SheetsApiError) throw new HttpError(500, `Google Sheets API error: ${error.message}`, { cause: error });
    throw error;
  }
}

export async function getSheetNames(deps: SpreadsheetDeps): Promise<string[]> {
  const sheets = sheetsFrom(deps);
  return callSheets(() => sheets.getSheetNames());
}

export async function getSheetData(query: unknown, deps: SpreadsheetDeps): Promise<SheetData> {
  const range = toSheetRange(SheetRangeSchema.parse(query));
  const sheets = sheetsFrom(deps);
  return callSheets(() => sheets.getValues(range));
}

export async function updateSheetData(body: unknown, deps: SpreadsheetDeps): Promise<UpdateResult> {
  const request = UpdateRequestSchema.parse(body);
  const sheets = sheetsFrom(deps);
  const result = await callSheets(() => sheets.updateValues({ range: toSheetRange(request.range), values: request.values, valueInputOption: request.value_input_option }));
  return { updated_cells: result.updatedCells, updated_range: result.updatedRange };
}

export async function appendSheetData(body: unknown, deps: SpreadsheetDeps): Promise<AppendResult> {
  const request = AppendRequestSchema.parse(body);
  const sheets = sheetsFrom(deps);
  const result = await callSheets(() => sheets.appendValues({ range: toSheetRange(request.range), values: request.values, valueInputOption: request.value_input_option }));
  return { appended_cells: result.appendedCells, appended_range: result.appendedRange };
}

export async function clearSheetData(query: unknown, deps: SpreadsheetDeps): Promise<{ message: string }> {
  const range = toSheetRange(SheetRangeSchema.parse(query));
  const sheets = sheetsFrom(deps);
  const cleared = await callSheets(() => sheets.clearValues(range));
  return { message: `Range ${cleared} cleared successfully` };
}

export function createSpreadsheetRouter(deps: SpreadsheetDeps): Router {
  const router = Router();

  router.get(
    '/sheets',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await getSheetNames(deps));
    })
  );
  router.get(
    '/data',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await getSheetData(req.query, deps));
    })
  );
  router.post(
    '/update',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await updateSheetData(req.body, deps));
    })
  );
  router.post(
    '/append',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await appendSheetData(req.body, deps));
    })
  );
  router.delete(
    '/clear',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await clearSheetData(req.query, deps));
    })
  );

  return router;
}
