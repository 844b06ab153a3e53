import { BoundingBox, ConfidenceTier, GeoPoint } from '@ticket-dispatch/shared-models';
import { ReferenceDataService } from '../reference-data/reference-data.service';
import { closestMatch, normalizeName } from '../reference-data/text-similarity';
import { GeoProviderClient } from './geo-provider.client';

/**
 * Location input after alias normalization. Blank fields are absent.
 */
export interface GeoQuery {
  city?: string;
  region?: string;
}

export type StrategyOutcome =
  | { kind: 'hit'; point: GeoPoint; detail?: string }
  | { kind: 'skip'; detail: string; rejected?: boolean };

/**
 * One tier of the geo fallback chain.
 */
export interface GeoStrategy {
  readonly tier: ConfidenceTier;
  attempt(query: GeoQuery): Promise<StrategyOutcome>;
}

export function isInsideBox(box: BoundingBox, point: GeoPoint): boolean {
  return (
    point.lat >= box.minLat &&
    point.lat <= box.maxLat &&
    point.lon >= box.minLon &&
    point.lon <= box.maxLon
  );
}

/**
 * Provider lookup; a hit outside the service area counts as a miss.
 */
export class ProviderStrategy implements GeoStrategy {
  constructor(
    readonly tier: ConfidenceTier,
    private readonly client: GeoProviderClient,
    private readonly serviceArea: BoundingBox,
    private readonly buildText: (query: GeoQuery) => string | null
  ) {}

  async attempt(query: GeoQuery): Promise<StrategyOutcome> {
    const text = this.buildText(query);
    if (text === null) {
      return { kind: 'skip', detail: 'not enough input' };
    }

    const outcome = await this.client.query(text);
    switch (outcome.kind) {
      case 'hit':
        if (!isInsideBox(this.serviceArea, outcome.point)) {
          return {
            kind: 'skip',
            rejected: true,
            detail: `'${text}' resolved outside the service area (${outcome.point.lat}, ${outcome.point.lon})`
          };
        }
        return { kind: 'hit', point: outcome.point, detail: text };
      case 'miss':
        return { kind: 'skip', detail: `no provider result for '${text}'` };
      case 'error':
        return { kind: 'skip', detail: `provider error: ${outcome.message}` };
      case 'disabled':
        return { kind: 'skip', detail: 'provider not configured' };
    }
  }
}

/** "city, region, qualifier"; needs a city */
export function cityQueryText(qualifier: string): (query: GeoQuery) => string | null {
  return (query) =>
    query.city ? [query.city, query.region, qualifier].filter(Boolean).join(', ') : null;
}

/** "region, qualifier"; needs a region */
export function regionQueryText(qualifier: string): (query: GeoQuery) => string | null {
  return (query) => (query.region ? `${query.region}, ${qualifier}` : null);
}

export class ExactTableStrategy implements GeoStrategy {
  readonly tier: ConfidenceTier = 'TABLE_EXACT';

  constructor(private readonly referenceData: ReferenceDataService) {}

  async attempt(query: GeoQuery): Promise<StrategyOutcome> {
    if (!query.region) return { kind: 'skip', detail: 'no region' };

    const point = this.referenceData.findSettlement(query.region);
    return point
      ? { kind: 'hit', point, detail: query.region }
      : { kind: 'skip', detail: `'${query.region}' not in table` };
  }
}

/**
 * Typo-tolerant table lookup on bigram similarity of normalized names.
 */
export class FuzzyTableStrategy implements GeoStrategy {
  readonly tier: ConfidenceTier = 'TABLE_FUZZY';

  constructor(
    private readonly referenceData: ReferenceDataService,
    private readonly threshold: number
  ) {}

  async attempt(query: GeoQuery): Promise<StrategyOutcome> {
    if (!query.region) return { kind: 'skip', detail: 'no region' };

    const settlements = this.referenceData.getSettlements();
    const match = closestMatch(
      query.region,
      settlements.map(([name]) => name),
      this.threshold
    );
    if (!match) {
      return { kind: 'skip', detail: `no table name within ${this.threshold} of '${query.region}'` };
    }

    const entry = settlements.find(([name]) => name === match.candidate);
    return entry
      ? { kind: 'hit', point: entry[1], detail: `'${query.region}' ≈ '${match.candidate}'` }
      : { kind: 'skip', detail: `'${match.candidate}' vanished from table` };
  }
}

/**
 * Last resort: table key contained in the region or the other way round.
 */
export class PartialTableStrategy implements GeoStrategy {
  readonly tier: ConfidenceTier = 'TABLE_PARTIAL';

  constructor(private readonly referenceData: ReferenceDataService) {}

  async attempt(query: GeoQuery): Promise<StrategyOutcome> {
    if (!query.region) return { kind: 'skip', detail: 'no region' };

    const region = normalizeName(query.region);
    const entry = this.referenceData.getSettlements().find(([name]) => {
      const key = normalizeName(name);
      return region.includes(key) || key.includes(region);
    });

    return entry
      ? { kind: 'hit', point: entry[1], detail: `'${query.region}' ~ '${entry[0]}'` }
      : { kind: 'skip', detail: `no table key overlaps '${query.region}'` };
  }
}
