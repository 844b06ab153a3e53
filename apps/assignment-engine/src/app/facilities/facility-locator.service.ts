import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Facility,
  RankedFacilities,
  RankedFacility,
  ResolvedLocation
} from '@ticket-dispatch/shared-models';
import { DEFAULT_FALLBACK_HUBS } from '../config/env.validation';
import { InconsistentStateError } from '../errors/inconsistent-state.error';
import { ReferenceDataService } from '../reference-data/reference-data.service';
import { closestMatch } from '../reference-data/text-similarity';
import { StaffRosterService } from '../staff/staff-roster.service';
import { haversineKm } from './haversine';

/**
 * Facility Locator
 *
 * Ranks facilities for a resolved location:
 * - city naming exactly one office → that office
 * - foreign, country-less or unresolved → the two fallback hubs, alternating
 *   which goes first
 * - otherwise nearest by great-circle distance, with a load-based tie-break
 *   between the two nearest when they are within the tie-break radius
 */
@Injectable()
export class FacilityLocatorService {
  private readonly logger = new Logger(FacilityLocatorService.name);

  private readonly tieBreakRadiusKm: number;

  private readonly fuzzyThreshold: number;

  private readonly hubNames: [string, string];

  /** Alternating selector for the hub pair; survives across tickets */
  private hubCounter = 0;

  constructor(
    config: ConfigService,
    private readonly referenceData: ReferenceDataService,
    private readonly roster: StaffRosterService
  ) {
    this.tieBreakRadiusKm = config.get<number>('ROUTING_TIE_BREAK_RADIUS_KM') ?? 50;
    this.fuzzyThreshold = config.get<number>('GEO_FUZZY_THRESHOLD') ?? 0.75;
    this.hubNames = config.get<[string, string]>('ROUTING_FALLBACK_HUBS') ?? DEFAULT_FALLBACK_HUBS;
  }

  get radiusKm(): number {
    return this.tieBreakRadiusKm;
  }

  /**
   * The one facility in the named city, if the city maps to exactly one.
   * Accepts transliterated and slightly misspelled names.
   */
  singleFacilityFor(city: string | undefined): Facility | null {
    if (!city || city.trim() === '') return null;

    const canonical = this.referenceData.canonicalName(city);
    let inCity = this.referenceData.getFacilitiesInCity(canonical);

    if (inCity.length === 0) {
      const match = closestMatch(
        canonical,
        this.referenceData.getFacilities().map((f) => f.name),
        this.fuzzyThreshold
      );
      if (match) {
        inCity = this.referenceData.getFacilitiesInCity(match.candidate);
      }
    }

    return inCity.length === 1 ? inCity[0] : null;
  }

  locate(location: ResolvedLocation, city?: string): RankedFacilities {
    if (location.kind === 'unresolved' && location.reason !== 'NO_MATCH') {
      return this.hubRanking();
    }

    const shortcut = this.singleFacilityFor(city);
    if (shortcut) {
      this.logger.debug(`City shortcut: '${city ?? ''}' → ${shortcut.name}`);
      return {
        basis: 'CITY_SHORTCUT',
        candidates: [{ facility: shortcut, distanceKm: null }],
        geoNearest: null
      };
    }

    if (location.kind === 'unresolved') {
      return this.hubRanking();
    }

    const ranked = this.referenceData
      .getFacilities()
      .map((facility) => ({
        facility,
        distanceKm: haversineKm(location, { lat: facility.latitude, lon: facility.longitude })
      }))
      .sort(
        (a, b) => a.distanceKm - b.distanceKm || a.facility.name.localeCompare(b.facility.name)
      );

    if (ranked.length === 0) {
      throw new InconsistentStateError('No facilities loaded', 'INVALID_REFERENCE_DATA');
    }

    const [nearest, second] = ranked;
    if (second && second.distanceKm - nearest.distanceKm <= this.tieBreakRadiusKm) {
      const nearestLoad = this.roster.facilityLoad(nearest.facility.name);
      const secondLoad = this.roster.facilityLoad(second.facility.name);

      if (secondLoad < nearestLoad) {
        this.logger.debug(
          `Tie-break: ${second.facility.name} (load ${secondLoad}) over ` +
            `${nearest.facility.name} (load ${nearestLoad})`
        );
        return {
          basis: 'LOAD_TIE_BREAK',
          candidates: [second, nearest, ...ranked.slice(2)],
          geoNearest: nearest
        };
      }
    }

    return { basis: 'DISTANCE', candidates: ranked, geoNearest: nearest };
  }

  /**
   * Hubs in configured order. Missing hubs mean the configuration and the
   * facility table disagree.
   */
  getFallbackHubs(): Facility[] {
    return this.hubNames.map((name) => {
      const hub = this.referenceData.getFacility(name);
      if (!hub) {
        throw new InconsistentStateError(
          `Fallback hub "${name}" is not a known facility`,
          'UNKNOWN_FACILITY',
          { facility: name }
        );
      }
      return hub;
    });
  }

  resetHubAlternation(): void {
    this.hubCounter = 0;
  }

  private hubRanking(): RankedFacilities {
    const hubs = this.getFallbackHubs();
    const ordered = this.hubCounter % 2 === 0 ? hubs : [...hubs].reverse();
    this.hubCounter += 1;

    const candidates: RankedFacility[] = ordered.map((facility) => ({ facility, distanceKm: null }));
    this.logger.debug(`Hub alternation → ${candidates[0].facility.name}`);
    return { basis: 'HUB_ALTERNATION', candidates, geoNearest: null };
  }
}
