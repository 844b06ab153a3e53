import { ConfigService } from '@nestjs/config';
import {
  GeoProviderQuery,
  StaffMember,
  TicketAttributes
} from '@ticket-dispatch/shared-models';
import { validateEnv } from '../app/config/env.validation';
import { FacilityLocatorService } from '../app/facilities/facility-locator.service';
import { GeoProviderClient } from '../app/geo/geo-provider.client';
import { GeoResolverService } from '../app/geo/geo-resolver.service';
import { RateLimiterClock } from '../app/geo/provider-rate-limiter';
import { ReferenceTables } from '../app/reference-data/reference-data.loader';
import { ReferenceDataService } from '../app/reference-data/reference-data.service';
import { AssignmentOrchestratorService } from '../app/routing/assignment-orchestrator.service';
import { AssignmentStoreService } from '../app/routing/assignment-store.service';
import { EligibilityFilterService } from '../app/routing/eligibility-filter.service';
import { FairnessAllocatorService } from '../app/routing/fairness-allocator.service';
import { KeyedMutex } from '../app/staff/keyed-mutex';
import { StaffRosterService } from '../app/staff/staff-roster.service';
import { AssignmentStatsService } from '../app/stats/assignment-stats.service';

/**
 * Five offices: the two hubs, two regional ones far from everything, and
 * Каскелен about 22 km from Алматы for tie-break cases.
 */
export function buildTestTables(): ReferenceTables {
  return {
    facilities: [
      { name: 'Астана', address: 'Астана, ул. Тестовая, 1', latitude: 51.1295, longitude: 71.4431 },
      { name: 'Алматы', address: 'Алматы, ул. Тестовая, 2', latitude: 43.2183, longitude: 76.8932 },
      { name: 'Актау', address: 'Актау, мкр. Тестовый, 3', latitude: 43.6356, longitude: 51.1683 },
      { name: 'Караганда', address: 'Караганда, ул. Тестовая, 4', latitude: 49.8156, longitude: 73.0833 },
      { name: 'Каскелен', address: 'Каскелен, ул. Тестовая, 5', latitude: 43.2, longitude: 76.62 }
    ],
    settlements: [
      ['Мангистауская', { lat: 43.6415, lon: 51.1727 }],
      ['Карагандинская', { lat: 49.8047, lon: 73.1094 }],
      ['Алматинская', { lat: 43.35, lon: 77.0 }],
      ['Акмолинская', { lat: 51.1694, lon: 71.4491 }],
      ['Жанаозен', { lat: 43.3333, lon: 52.8667 }]
    ],
    aliases: [
      ['aktau', 'Актау'],
      ['mangystau', 'Мангистауская'],
      ['almaty', 'Алматы'],
      ['karaganda region', 'Карагандинская']
    ]
  };
}

export function testConfig(env: Record<string, string> = {}): ConfigService {
  return new ConfigService(validateEnv(env));
}

/** Clock that moves only when slept on or advanced */
export class FakeClock implements RateLimiterClock {
  current = 0;

  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeTicket(overrides: Partial<TicketAttributes> = {}): TicketAttributes {
  return {
    ticketId: 'T-1',
    segment: 'Mass',
    ticketType: 'CONSULTATION',
    sentiment: 'NEUTRAL',
    language: 'RU',
    country: 'Казахстан',
    ...overrides
  };
}

export function makeStaff(
  id: string,
  facility: string,
  overrides: Partial<Omit<StaffMember, 'id' | 'facility'>> = {}
): StaffMember {
  return {
    id,
    fullName: `Manager ${id}`,
    facility,
    position: 'SPECIALIST',
    skills: [],
    currentLoad: 0,
    ...overrides
  };
}

export interface TestEngineOptions {
  tables?: ReferenceTables;
  env?: Record<string, string>;
  provider?: GeoProviderQuery | null;
  clock?: RateLimiterClock;
  staff?: StaffMember[];
}

export interface TestEngine {
  config: ConfigService;
  referenceData: ReferenceDataService;
  roster: StaffRosterService;
  mutex: KeyedMutex;
  geo: GeoResolverService;
  locator: FacilityLocatorService;
  eligibility: EligibilityFilterService;
  allocator: FairnessAllocatorService;
  store: AssignmentStoreService;
  orchestrator: AssignmentOrchestratorService;
  stats: AssignmentStatsService;
}

/**
 * Wire the engine by hand, the same graph the Nest modules build.
 */
export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
  const config = testConfig(options.env);
  const referenceData = new ReferenceDataService(options.tables ?? buildTestTables());
  const roster = new StaffRosterService(referenceData);
  const mutex = new KeyedMutex();
  const client = new GeoProviderClient(config, options.provider ?? null, options.clock ?? new FakeClock());
  const geo = new GeoResolverService(config, referenceData, client);
  const locator = new FacilityLocatorService(config, referenceData, roster);
  const eligibility = new EligibilityFilterService();
  const allocator = new FairnessAllocatorService(roster, mutex);
  const store = new AssignmentStoreService();
  const orchestrator = new AssignmentOrchestratorService(
    config,
    geo,
    locator,
    eligibility,
    allocator,
    roster,
    store,
    mutex
  );
  const stats = new AssignmentStatsService(store, roster);

  if (options.staff) {
    roster.loadRoster(options.staff);
  }

  return {
    config,
    referenceData,
    roster,
    mutex,
    geo,
    locator,
    eligibility,
    allocator,
    store,
    orchestrator,
    stats
  };
}
