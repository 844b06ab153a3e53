/**
 * Geo Interfaces
 * Coordinates, bounding boxes and the geo resolver's outcome.
 */

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/**
 * Which strategy produced a set of coordinates.
 * Recorded for observability only; routing never branches on it.
 */
export type ConfidenceTier =
  | 'PROVIDER_CITY'    // Provider hit on city + region + country
  | 'PROVIDER_REGION'  // Provider hit on region + country
  | 'TABLE_EXACT'      // Offline table, exact region name
  | 'TABLE_FUZZY'      // Offline table, typo-tolerant match
  | 'TABLE_PARTIAL'    // Offline table, substring match
  | 'FACILITY_CITY';   // City mapped straight to an office

export type UnresolvedReason =
  | 'FOREIGN_COUNTRY' // Country names a country outside the service area
  | 'NO_COUNTRY'      // Country field empty; treated like a foreign client
  | 'NO_MATCH';       // Every strategy missed

export interface ResolvedCoordinates extends GeoPoint {
  kind: 'resolved';
  tier: ConfidenceTier;
}

export interface UnresolvedLocation {
  kind: 'unresolved';
  reason: UnresolvedReason;
}

export type ResolvedLocation = ResolvedCoordinates | UnresolvedLocation;

/**
 * Geocoding provider supplied by the integration layer.
 * Returns null when the provider has no answer; may reject on transport errors.
 */
export type GeoProviderQuery = (text: string) => Promise<GeoPoint | null>;
