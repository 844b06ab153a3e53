import { Inject, Injectable, Logger } from '@nestjs/common';
import { Facility, GeoPoint } from '@ticket-dispatch/shared-models';
import { InconsistentStateError } from '../errors/inconsistent-state.error';
import { REFERENCE_TABLES, ReferenceTables } from './reference-data.loader';
import { normalizeName } from './text-similarity';

/**
 * Read-only facility set, settlement coordinates and transliteration aliases.
 * Built once from the injected tables; nothing here changes during a run.
 */
@Injectable()
export class ReferenceDataService {
  private readonly logger = new Logger(ReferenceDataService.name);

  /** Facility name → facility */
  private readonly facilities = new Map<string, Facility>();

  /** Normalized facility city → facilities located there */
  private readonly facilitiesByCity = new Map<string, Facility[]>();

  /** Settlements in table order (fuzzy/partial matching scan order) */
  private readonly settlements: ReadonlyArray<readonly [string, GeoPoint]>;

  /** Normalized settlement name → coordinates */
  private readonly settlementIndex = new Map<string, GeoPoint>();

  /** Normalized alias → canonical name */
  private readonly aliases = new Map<string, string>();

  constructor(@Inject(REFERENCE_TABLES) tables: ReferenceTables) {
    for (const record of tables.facilities) {
      if (this.facilities.has(record.name)) {
        throw new InconsistentStateError(
          `Duplicate facility name: ${record.name}`,
          'INVALID_REFERENCE_DATA',
          { facility: record.name }
        );
      }

      const facility: Facility = Object.freeze({ ...record });
      this.facilities.set(facility.name, facility);

      const cityKey = normalizeName(facility.name);
      this.facilitiesByCity.set(cityKey, [...(this.facilitiesByCity.get(cityKey) ?? []), facility]);
    }

    this.settlements = tables.settlements.map(
      ([name, point]) => [name, Object.freeze({ lat: point.lat, lon: point.lon })] as const
    );
    for (const [name, point] of this.settlements) {
      const key = normalizeName(name);
      if (!this.settlementIndex.has(key)) {
        this.settlementIndex.set(key, point);
      }
    }

    for (const [alias, canonical] of tables.aliases) {
      this.aliases.set(normalizeName(alias), canonical.trim());
    }

    this.logger.log(
      `Reference data loaded: ${this.facilities.size} facilities, ` +
        `${this.settlements.length} settlements, ${this.aliases.size} aliases`
    );
  }

  getFacilities(): Facility[] {
    return Array.from(this.facilities.values());
  }

  getFacility(name: string): Facility | undefined {
    return this.facilities.get(name);
  }

  hasFacility(name: string): boolean {
    return this.facilities.has(name);
  }

  /**
   * Facilities whose city matches the (already canonical) name exactly.
   */
  getFacilitiesInCity(city: string): Facility[] {
    return [...(this.facilitiesByCity.get(normalizeName(city)) ?? [])];
  }

  /**
   * Map a transliterated name to its native-script form.
   * Unknown names come back trimmed but otherwise unchanged.
   */
  canonicalName(name: string): string {
    return this.aliases.get(normalizeName(name)) ?? name.trim();
  }

  findSettlement(name: string): GeoPoint | undefined {
    return this.settlementIndex.get(normalizeName(name));
  }

  getSettlements(): ReadonlyArray<readonly [string, GeoPoint]> {
    return this.settlements;
  }
}
