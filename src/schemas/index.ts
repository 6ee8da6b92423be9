import { z } from 'zod';
import { isValidA1Notation } from '../spreadsheet/range-operations.ts';
import type { SheetRange } from '../types.ts';

// null represents empty cells - JSON cannot represent undefined, and Google API uses null for empty cells
export const SheetCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SheetRowsSchema = z.array(z.array(SheetCellSchema)).describe('Rows of cell values');

export const ValueInputOptionSchema = z.enum(['RAW', 'USER_ENTERED']);

const CellSchema = z
  .string()
  .min(1)
  .refine((cell) => isValidA1Notation(cell), { message: 'Invalid cell reference' });

export const SheetRangeSchema = z.object({
  sheet_name: z.string().min(1).describe('Name of the sheet'),
  start_cell: CellSchema.describe("Starting cell (e.g., 'A1')"),
  end_cell: CellSchema.nullish().describe("Ending cell (e.g., 'B10')"),
});

export type SheetRangeInput = z.infer<typeof SheetRangeSchema>;

export function toSheetRange(input: SheetRangeInput): SheetRange {
  return {
    sheetName: input.sheet_name,
    startCell: input.start_cell,
    ...(input.end_cell && { endCell: input.end_cell }),
  };
}

export const UpdateRequestSchema = z.object({
  range: SheetRangeSchema,
  values: SheetRowsSchema,
  value_input_option: ValueInputOptionSchema.default('USER_ENTERED'),
});

export const AppendRequestSchema = UpdateRequestSchema;

// Browser Geolocation API fields, snake_case as the page posts them
export const LocationDataSchema = z.object({
  latitude: z.number().describe('Latitude coordinate'),
  longitude: z.number().describe('Longitude coordinate'),
  accuracy: z.number().describe('Accuracy of the coordinates in meters'),
  altitude: z.number().nullish().describe('Altitude in meters above the WGS84 ellipsoid'),
  altitude_accuracy: z.number().nullish().describe('Accuracy of the altitude in meters'),
  heading: z.number().nullish().describe('Heading in degrees clockwise from true north'),
  speed: z.number().nullish().describe('Speed in meters per second'),
  phone_number: z.string().describe('Phone number of the user'),
  message: z.string().nullish().describe('Optional message from the user'),
});

export type LocationData = z.infer<typeof LocationDataSchema>;

const ColumnDictionarySchema = z.record(z.string(), z.string());

export const TransferSettingsFileSchema = z
  .object({
    sourceSheet: z.string().min(1),
    targetSheet: z.string().min(1),
    sourceColumns: ColumnDictionarySchema,
    targetColumns: ColumnDictionarySchema,
    fieldMapping: ColumnDictionarySchema,
    batchSize: z.number().int().positive(),
    headerCheckInterval: z.number().int().positive(),
    maxRows: z.number().int().positive(),
    maxColumns: z.number().int().positive().max(18278),
    defaultTargetWidth: z.number().int().positive(),
    pendingStatus: z.string(),
    addedMarker: z.string().min(1),
  })
  .partial()
  .strict();
