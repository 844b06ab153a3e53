import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BoundingBox,
  ResolvedLocation,
  TicketLocation,
  UnresolvedLocation
} from '@ticket-dispatch/shared-models';
import {
  DEFAULT_BOUNDING_BOX,
  DEFAULT_DOMESTIC_COUNTRY_NAMES
} from '../config/env.validation';
import { ReferenceDataService } from '../reference-data/reference-data.service';
import { normalizeName } from '../reference-data/text-similarity';
import { GeoProviderClient } from './geo-provider.client';
import {
  ExactTableStrategy,
  FuzzyTableStrategy,
  GeoQuery,
  GeoStrategy,
  PartialTableStrategy,
  ProviderStrategy,
  cityQueryText,
  regionQueryText
} from './geo-strategies';

/**
 * Turns a free-text address into coordinates through an ordered chain of
 * strategies: provider by city, provider by region, then the offline table
 * (exact, fuzzy, partial). Never throws.
 */
@Injectable()
export class GeoResolverService {
  private readonly logger = new Logger(GeoResolverService.name);

  private readonly strategies: GeoStrategy[];

  private readonly domesticCountries: Set<string>;

  constructor(
    config: ConfigService,
    private readonly referenceData: ReferenceDataService,
    providerClient: GeoProviderClient
  ) {
    const serviceArea = config.get<BoundingBox>('GEO_BOUNDING_BOX') ?? DEFAULT_BOUNDING_BOX;
    const qualifier = config.get<string>('GEO_COUNTRY_QUALIFIER') ?? 'Казахстан';
    const threshold = config.get<number>('GEO_FUZZY_THRESHOLD') ?? 0.75;
    const domestic =
      config.get<string[]>('GEO_DOMESTIC_COUNTRY_NAMES') ?? DEFAULT_DOMESTIC_COUNTRY_NAMES;

    this.domesticCountries = new Set(domestic.map((name) => normalizeName(name)));
    this.strategies = [
      new ProviderStrategy('PROVIDER_CITY', providerClient, serviceArea, cityQueryText(qualifier)),
      new ProviderStrategy(
        'PROVIDER_REGION',
        providerClient,
        serviceArea,
        regionQueryText(qualifier)
      ),
      new ExactTableStrategy(referenceData),
      new FuzzyTableStrategy(referenceData, threshold),
      new PartialTableStrategy(referenceData)
    ];
  }

  /**
   * True when the country field names a country outside the service area.
   * A blank field is not foreign; `screenCountry` handles it.
   */
  isForeign(country: string | undefined): boolean {
    if (!country || country.trim() === '') return false;
    return !this.domesticCountries.has(normalizeName(country));
  }

  /**
   * Tickets that go to the hub pair without any lookup: a foreign country
   * or no country at all. Null means the address is worth resolving.
   */
  screenCountry(country: string | undefined): UnresolvedLocation | null {
    if (!country || country.trim() === '') {
      return { kind: 'unresolved', reason: 'NO_COUNTRY' };
    }
    if (this.isForeign(country)) {
      return { kind: 'unresolved', reason: 'FOREIGN_COUNTRY' };
    }
    return null;
  }

  async resolve(location: TicketLocation): Promise<ResolvedLocation> {
    const screened = this.screenCountry(location.country);
    if (screened) {
      this.logger.debug(`${screened.reason} ('${location.country ?? ''}'): skipping lookup`);
      return screened;
    }

    const query = this.buildQuery(location);

    for (const strategy of this.strategies) {
      try {
        const outcome = await strategy.attempt(query);
        if (outcome.kind === 'hit') {
          this.logger.debug(
            `${strategy.tier}: ${outcome.detail ?? ''} → (${outcome.point.lat}, ${outcome.point.lon})`
          );
          return {
            kind: 'resolved',
            tier: strategy.tier,
            lat: outcome.point.lat,
            lon: outcome.point.lon
          };
        }
        if (outcome.rejected) {
          this.logger.warn(`${strategy.tier} rejected: ${outcome.detail}`);
        } else {
          this.logger.debug(`${strategy.tier} skipped: ${outcome.detail}`);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`${strategy.tier} failed: ${message}`);
      }
    }

    this.logger.debug(
      `No coordinates for region='${query.region ?? ''}' city='${query.city ?? ''}'`
    );
    return { kind: 'unresolved', reason: 'NO_MATCH' };
  }

  private buildQuery(location: TicketLocation): GeoQuery {
    const query: GeoQuery = {};
    const city = location.city?.trim();
    const region = location.region?.trim();
    if (city) query.city = this.referenceData.canonicalName(city);
    if (region) query.region = this.referenceData.canonicalName(region);
    return query;
  }
}
