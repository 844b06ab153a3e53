import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AssignmentResult,
  BatchFailure,
  BatchResult,
  EligibilityRequirement,
  Facility,
  RankedFacilities,
  ResolvedLocation,
  RoutingNote,
  TicketAttributes
} from '@ticket-dispatch/shared-models';
import { InconsistentStateError } from '../errors/inconsistent-state.error';
import { FacilityLocatorService } from '../facilities/facility-locator.service';
import { haversineKm } from '../facilities/haversine';
import { GeoResolverService } from '../geo/geo-resolver.service';
import { KeyedMutex } from '../staff/keyed-mutex';
import { StaffRosterService, staffLockKey } from '../staff/staff-roster.service';
import { AssignmentStoreService } from './assignment-store.service';
import { EligibilityFilterService } from './eligibility-filter.service';
import { FairnessAllocatorService } from './fairness-allocator.service';
import { buildFingerprint } from './fingerprint';

export interface BatchOptions {
  /** Tickets processed at once; defaults to ROUTING_WORKER_CONCURRENCY */
  concurrency?: number;
}

const MAX_BATCH_FAILURES = 50;

const REQUIREMENT_LABELS: Record<EligibilityRequirement, string> = {
  VIP_SKILL: 'VIP skill',
  CHIEF_SPECIALIST: 'Chief Specialist',
  KZ_SKILL: 'KZ language skill',
  ENG_SKILL: 'ENG language skill'
};

function roundKm(km: number): number {
  return Math.round(km * 10) / 10;
}

function distanceKm(location: ResolvedLocation, facility: Facility): number | null {
  if (location.kind !== 'resolved') return null;
  return haversineKm(location, { lat: facility.latitude, lon: facility.longitude });
}

/**
 * Runs one ticket through the cascade:
 * geo resolution → facility ranking → eligibility → allocation, escalating to
 * the fallback hubs when a facility has no eligible staff.
 *
 * Results are stored once per ticket id; repeated and concurrent calls for the
 * same ticket return the same result.
 */
@Injectable()
export class AssignmentOrchestratorService {
  private readonly logger = new Logger(AssignmentOrchestratorService.name);

  /** ticketId → computation in progress */
  private readonly inFlight = new Map<string, Promise<AssignmentResult>>();

  private readonly defaultConcurrency: number;

  constructor(
    config: ConfigService,
    private readonly geo: GeoResolverService,
    private readonly locator: FacilityLocatorService,
    private readonly eligibility: EligibilityFilterService,
    private readonly allocator: FairnessAllocatorService,
    private readonly roster: StaffRosterService,
    private readonly store: AssignmentStoreService,
    private readonly mutex: KeyedMutex
  ) {
    this.defaultConcurrency = config.get<number>('ROUTING_WORKER_CONCURRENCY') ?? 1;
  }

  /**
   * Assign a ticket. Only InconsistentStateError escapes; every other
   * outcome, including "nobody can take it", is a stored result.
   */
  process(ticket: TicketAttributes): Promise<AssignmentResult> {
    const existing = this.store.get(ticket.ticketId);
    if (existing) {
      return Promise.resolve(existing);
    }

    const running = this.inFlight.get(ticket.ticketId);
    if (running) {
      return running;
    }

    const run = this.compute(ticket).finally(() => {
      this.inFlight.delete(ticket.ticketId);
    });
    this.inFlight.set(ticket.ticketId, run);
    return run;
  }

  /**
   * Process tickets through a small worker pool and summarize the run.
   */
  async processBatch(
    tickets: TicketAttributes[],
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    const batchId = this.generateBatchId();
    const startedAt = new Date().toISOString();
    const startMs = Date.now();
    const concurrency = Math.max(
      1,
      Math.min(Math.floor(options.concurrency ?? this.defaultConcurrency), tickets.length)
    );

    this.logger.log(
      `Batch ${batchId}: ${tickets.length} tickets, ${concurrency} worker(s)`
    );

    const slots: Array<{ result: AssignmentResult; reused: boolean } | undefined> = [];
    const failures: BatchFailure[] = [];
    let failed = 0;
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < tickets.length) {
        const index = next++;
        const ticket = tickets[index];
        const reused = this.store.has(ticket.ticketId) || this.inFlight.has(ticket.ticketId);

        try {
          slots[index] = { result: await this.process(ticket), reused };
        } catch (err) {
          failed++;
          if (failures.length < MAX_BATCH_FAILURES) {
            failures.push({
              ticketId: ticket.ticketId,
              code: err instanceof InconsistentStateError ? err.code : 'UNEXPECTED',
              reason: err instanceof Error ? err.message : 'Unknown error'
            });
          }
          this.logger.error(
            `Batch ${batchId}: ticket ${ticket.ticketId} failed: ` +
              (err instanceof Error ? err.message : String(err))
          );
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    let assigned = 0;
    let unassigned = 0;
    let reusedCount = 0;
    const assignedByFacility: Record<string, number> = {};
    const results: AssignmentResult[] = [];

    for (const slot of slots) {
      if (!slot) continue;
      results.push(slot.result);

      if (slot.reused) {
        reusedCount++;
      } else if (slot.result.status === 'ASSIGNED' && slot.result.facility) {
        assigned++;
        assignedByFacility[slot.result.facility] =
          (assignedByFacility[slot.result.facility] || 0) + 1;
      } else {
        unassigned++;
      }
    }

    const durationMs = Date.now() - startMs;
    this.logger.log(
      `Batch ${batchId}: ${assigned} assigned, ${unassigned} unassigned, ` +
        `${reusedCount} reused, ${failed} failed in ${durationMs}ms`
    );

    return {
      batchId,
      totalTickets: tickets.length,
      assigned,
      unassigned,
      reused: reusedCount,
      failed,
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs,
      assignedByFacility,
      results,
      failures
    };
  }

  /**
   * Drop a stored result and give back the load it added, so the ticket can
   * be processed again. Round-robin counters are not rewound.
   */
  async releaseAssignment(ticketId: string): Promise<AssignmentResult | null> {
    const running = this.inFlight.get(ticketId);
    if (running) {
      await running.then(
        () => undefined,
        (err: unknown) =>
          this.logger.warn(
            `Release of ${ticketId}: in-flight run failed: ` +
              (err instanceof Error ? err.message : String(err))
          )
      );
    }

    // Out of the store before the staff lock is awaited; process() never sees it again
    const existing = this.store.remove(ticketId);
    if (!existing) {
      return null;
    }

    const staffId = existing.staffId;
    if (existing.status === 'ASSIGNED' && staffId) {
      await this.mutex.runExclusive([staffLockKey(staffId)], () =>
        this.roster.decrementLoad(staffId)
      );
    }

    this.logger.log(`Released ${ticketId}${staffId ? ` from ${staffId}` : ''}`);
    return existing;
  }

  getResult(ticketId: string): AssignmentResult | undefined {
    return this.store.get(ticketId);
  }

  /**
   * Clear fingerprint counters and hub alternation. Stored results and staff
   * loads are untouched.
   */
  resetAllocatorState(): void {
    this.allocator.reset();
    this.locator.resetHubAlternation();
  }

  // --- Private ---

  private async compute(ticket: TicketAttributes): Promise<AssignmentResult> {
    const startMs = Date.now();

    if (ticket.ticketType === 'SPAM') {
      this.logger.log(`${ticket.ticketId}: spam, not routed`);
      return this.store.record({
        ...this.emptyResult(ticket.ticketId, startMs),
        reason: 'SPAM_NOT_ROUTED'
      });
    }

    this.roster.assertConsistent();
    const hubs = this.locator.getFallbackHubs();

    const location = await this.resolveLocation(ticket);
    const ranking = this.locator.locate(location, ticket.city);
    const primary = ranking.candidates[0].facility;

    const sequence = [primary];
    for (const hub of hubs) {
      if (!sequence.some((f) => f.name === hub.name)) sequence.push(hub);
    }

    for (const facility of sequence) {
      const pool = this.eligibility.filter(this.roster.getByFacility(facility.name), ticket);
      if (pool.length === 0) {
        this.logger.debug(`${ticket.ticketId}: no eligible staff at ${facility.name}`);
        continue;
      }

      const fingerprint = buildFingerprint(facility.name, ticket);
      const allocation = await this.allocator.allocate(pool, fingerprint);
      if (!allocation) continue;

      const assignedKm = distanceKm(location, facility);
      const note =
        facility.name === primary.name ? null : this.buildNote(ticket, location, primary, facility);

      this.logger.log(
        `${ticket.ticketId} → ${facility.name} / ${allocation.staff.id} ` +
          `(${ranking.basis}${note ? `, ${note.kind}` : ''})`
      );

      return this.store.record({
        ...this.emptyResult(ticket.ticketId, startMs),
        ...this.geoFields(location, ranking),
        status: 'ASSIGNED',
        facility: facility.name,
        staffId: allocation.staff.id,
        staffName: allocation.staff.fullName,
        fingerprint,
        roundRobinIndex: allocation.roundRobinIndex,
        note,
        distanceToAssignedKm: assignedKm === null ? null : roundKm(assignedKm)
      });
    }

    const last = sequence[sequence.length - 1];
    this.logger.warn(
      `${ticket.ticketId}: no eligible staff at ${sequence.map((f) => f.name).join(', ')}`
    );

    return this.store.record({
      ...this.emptyResult(ticket.ticketId, startMs),
      ...this.geoFields(location, ranking),
      facility: last.name,
      reason: 'NO_ELIGIBLE_STAFF'
    });
  }

  /**
   * Foreign and country-less tickets skip lookup. A city with a single
   * office uses the office's coordinates. Everything else goes through the
   * geo chain.
   */
  private async resolveLocation(ticket: TicketAttributes): Promise<ResolvedLocation> {
    const screened = this.geo.screenCountry(ticket.country);
    if (screened) {
      return screened;
    }

    const office = this.locator.singleFacilityFor(ticket.city);
    if (office) {
      return {
        kind: 'resolved',
        tier: 'FACILITY_CITY',
        lat: office.latitude,
        lon: office.longitude
      };
    }

    return this.geo.resolve(ticket);
  }

  private buildNote(
    ticket: TicketAttributes,
    location: ResolvedLocation,
    from: Facility,
    to: Facility
  ): RoutingNote {
    const unmet = this.eligibility.firstUnmetRequirement(
      this.roster.getByFacility(from.name),
      ticket
    );
    const missing = unmet ? ` (missing ${REQUIREMENT_LABELS[unmet]})` : '';

    const fromKm = distanceKm(location, from);
    const toKm = distanceKm(location, to);
    const gapKm = fromKm !== null && toKm !== null ? toKm - fromKm : null;

    if (gapKm !== null && gapKm > this.locator.radiusKm) {
      return {
        kind: 'SKILL_GAP',
        fromFacility: from.name,
        toFacility: to.name,
        unmetRequirement: unmet,
        message:
          `No eligible staff at ${from.name}${missing}; ` +
          `routed to ${to.name}, ${roundKm(gapKm)} km further`
      };
    }

    return {
      kind: 'HUB_ESCALATION',
      fromFacility: from.name,
      toFacility: to.name,
      unmetRequirement: unmet,
      message: `No eligible staff at ${from.name}${missing}; escalated to hub ${to.name}`
    };
  }

  private geoFields(
    location: ResolvedLocation,
    ranking: RankedFacilities
  ): Pick<
    AssignmentResult,
    'location' | 'routingBasis' | 'geoNearestFacility' | 'distanceToNearestKm'
  > {
    const nearest = ranking.geoNearest;
    return {
      location,
      routingBasis: ranking.basis,
      geoNearestFacility: nearest ? nearest.facility.name : null,
      distanceToNearestKm:
        nearest && nearest.distanceKm !== null ? roundKm(nearest.distanceKm) : null
    };
  }

  private emptyResult(ticketId: string, startMs: number): AssignmentResult {
    return {
      ticketId,
      status: 'UNASSIGNED',
      facility: null,
      staffId: null,
      staffName: null,
      fingerprint: null,
      roundRobinIndex: null,
      location: null,
      routingBasis: null,
      note: null,
      reason: null,
      geoNearestFacility: null,
      distanceToNearestKm: null,
      distanceToAssignedKm: null,
      decidedAt: new Date().toISOString(),
      evaluationTimeMs: Date.now() - startMs
    };
  }

  private generateBatchId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `BATCH-${timestamp}-${random}`;
  }
}
