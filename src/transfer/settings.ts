import * as fs from 'fs/promises';
import { errorMessage } from '../lib/errors.ts';
import { TransferSettingsFileSchema } from '../schemas/index.ts';

/**
 * Everything that ties the transfer job to one particular pair of sheets.
 * Column dictionaries map logical field names to the header text expected in row 1.
 */
export interface TransferSettings {
  sourceSheet: string;
  targetSheet: string;
  sourceColumns: Record<string, string>;
  targetColumns: Record<string, string>;
  /** target field → source field */
  fieldMapping: Record<string, string>;
  batchSize: number;
  headerCheckInterval: number;
  maxRows: number;
  maxColumns: number;
  /** Width of a target row when no target header could be mapped */
  defaultTargetWidth: number;
  pendingStatus: string;
  addedMarker: string;
}

export const DEFAULT_TRANSFER_SETTINGS: TransferSettings = {
  sourceSheet: 'დაზარალებულთა შევსებული ინფორმაცია',
  targetSheet: 'დაზარალებულთა სია',
  sourceColumns: {
    timestamp: 'Column 1',
    name: 'სახელი, გვარი',
    district: 'რაიონი',
    village: 'სოფელი',
    exact_location: 'ზუსტი ადგილმდებარეობა',
    phone: 'ტელეფონის ნომერი',
    needs: 'რა სჭირდება?',
    detailed_info: 'დეტალური ინფორმაცია',
    last_contact: 'ბოლო კავშირი',
    id: 'id',
    added: 'added',
  },
  targetColumns: {
    name: 'სახელი',
    district: 'რაიონი',
    village: 'სოფელი',
    lat: 'lat',
    lon: 'lon',
    exact_location: 'ზუსტი ადგილმდებარეობა',
    phone: 'ტელეფონი',
    needs: 'საჭიროება',
    detailed_info: 'დეტალური ინფორმაცია',
    priority: 'პრიორიტეტი',
    added_date: 'დამატების თარიღი',
    status: 'სტატუსი',
    updates: 'განახლებები',
    id: 'id',
  },
  fieldMapping: {
    name: 'name',
    district: 'district',
    village: 'village',
    exact_location: 'exact_location',
    phone: 'phone',
    needs: 'needs',
    detailed_info: 'detailed_info',
  },
  batchSize: 100,
  headerCheckInterval: 10,
  maxRows: 100_000,
  maxColumns: 26,
  defaultTargetWidth: 14,
  pendingStatus: 'მომლოდინე',
  addedMarker: 'TRUE',
};

export function resolveTransferSettings(overrides: Partial<TransferSettings> = {}): TransferSettings {
  return { ...DEFAULT_TRANSFER_SETTINGS, ...overrides };
}

/**
 * Read a JSON settings file (any subset of TransferSettings) and merge it over the defaults.
 */
export async function loadTransferSettings(filePath?: string): Promise<TransferSettings> {
  if (!filePath) return resolveTransferSettings();

  const raw = await fs.readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Transfer settings file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  return resolveTransferSettings(TransferSettingsFileSchema.parse(parsed));
}
