/**
 * Facility (service office) reference data and locator output.
 */

export interface Facility {
  /** Unique office name, also the join key for staff */
  name: string;

  /** Street address */
  address: string;

  latitude: number;

  longitude: number;
}

/** How the locator arrived at its ranking */
export type RoutingBasis =
  | 'CITY_SHORTCUT'    // City maps to exactly one office
  | 'DISTANCE'         // Nearest office by great-circle distance
  | 'LOAD_TIE_BREAK'   // Two nearest within radius, lower aggregate load won
  | 'HUB_ALTERNATION'; // Foreign/unknown location, alternating default hubs

/**
 * A facility with its distance from the client, when known.
 */
export interface RankedFacility {
  facility: Facility;

  /** Great-circle distance in km, null when no coordinates were used */
  distanceKm: number | null;
}

/**
 * Facility Locator result. `candidates[0]` is the primary facility.
 */
export interface RankedFacilities {
  basis: RoutingBasis;

  candidates: RankedFacility[];

  /** Geographically nearest facility before any tie-break, when computed */
  geoNearest: RankedFacility | null;
}
