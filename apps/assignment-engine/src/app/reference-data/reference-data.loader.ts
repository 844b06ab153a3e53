import * as fs from 'fs';
import * as path from 'path';
import { Facility, GeoPoint } from '@ticket-dispatch/shared-models';
import { InconsistentStateError } from '../errors/inconsistent-state.error';
import { FacilityRecordDto, SettlementCoordinatesDto } from './reference-data.dto';
import { validateRecords } from './validate-records';

/**
 * Immutable lookup tables the engine is configured with.
 * Entry order matters: fuzzy and partial matching scan in this order.
 */
export interface ReferenceTables {
  facilities: Facility[];

  /** Settlement / region name → coordinates */
  settlements: Array<[string, GeoPoint]>;

  /** Transliterated name → native-script canonical name */
  aliases: Array<[string, string]>;
}

export const REFERENCE_TABLES = 'REFERENCE_TABLES';

export const DEFAULT_REFERENCE_DIR = path.resolve(__dirname, '..', '..', 'assets', 'reference');

export const REFERENCE_FILES = {
  facilities: 'facilities.json',
  settlements: 'settlements.json',
  aliases: 'aliases.json'
} as const;

function readJson(dir: string, fileName: string): unknown {
  const fullPath = path.join(dir, fileName);
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
    return parsed;
  } catch (err) {
    throw new InconsistentStateError(
      `Cannot read reference file ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
      'INVALID_REFERENCE_DATA'
    );
  }
}

function asObject(value: unknown, source: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InconsistentStateError(`${source}: expected a JSON object`, 'INVALID_REFERENCE_DATA');
  }
  return Object.fromEntries(Object.entries(value));
}

export function parseFacilities(raw: unknown): Facility[] {
  if (!Array.isArray(raw)) {
    throw new InconsistentStateError(
      `${REFERENCE_FILES.facilities}: expected a JSON array`,
      'INVALID_REFERENCE_DATA'
    );
  }

  return validateRecords(FacilityRecordDto, raw, REFERENCE_FILES.facilities).map((record) => ({
    name: record.name,
    address: record.address,
    latitude: record.latitude,
    longitude: record.longitude
  }));
}

export function parseSettlements(raw: unknown): Array<[string, GeoPoint]> {
  const entries = Object.entries(asObject(raw, REFERENCE_FILES.settlements));
  const points = validateRecords(
    SettlementCoordinatesDto,
    entries.map(([, value]) => value),
    REFERENCE_FILES.settlements
  );

  return entries.map(([name], index): [string, GeoPoint] => [
    name,
    { lat: points[index].lat, lon: points[index].lon }
  ]);
}

export function parseAliases(raw: unknown): Array<[string, string]> {
  const entries = Object.entries(asObject(raw, REFERENCE_FILES.aliases));

  return entries.map(([alias, canonical]): [string, string] => {
    if (typeof canonical !== 'string' || canonical.trim() === '') {
      throw new InconsistentStateError(
        `${REFERENCE_FILES.aliases}: alias "${alias}" must map to a non-empty string`,
        'INVALID_REFERENCE_DATA'
      );
    }
    return [alias, canonical];
  });
}

/**
 * Load the three reference files from a directory.
 */
export function loadReferenceTables(dir: string = DEFAULT_REFERENCE_DIR): ReferenceTables {
  return {
    facilities: parseFacilities(readJson(dir, REFERENCE_FILES.facilities)),
    settlements: parseSettlements(readJson(dir, REFERENCE_FILES.settlements)),
    aliases: parseAliases(readJson(dir, REFERENCE_FILES.aliases))
  };
}
