/**
 * Assignment Interfaces
 * Results produced by the assignment orchestrator, batch runs and stats.
 */

import { RoutingBasis } from './facility.interface';
import { ResolvedLocation } from './geo.interface';
import { StaffLoadSummary } from './staff.interface';

export type AssignmentStatus = 'ASSIGNED' | 'UNASSIGNED';

/** Why a ticket ended without a staff member */
export type UnassignedReason =
  | 'NO_ELIGIBLE_STAFF' // Primary facility and both hubs had empty pools
  | 'SPAM_NOT_ROUTED';  // Spam reached the engine; recorded, never routed

/** Hard requirement a facility could not satisfy */
export type EligibilityRequirement =
  | 'VIP_SKILL'
  | 'CHIEF_SPECIALIST'
  | 'KZ_SKILL'
  | 'ENG_SKILL';

/**
 * Explains a routing that deviates from plain geography.
 */
export interface RoutingNote {
  kind: 'HUB_ESCALATION' | 'SKILL_GAP';

  /** Facility the ticket would have gone to */
  fromFacility: string;

  /** Facility it went to instead */
  toFacility: string;

  /** First requirement the skipped facility failed, if known */
  unmetRequirement: EligibilityRequirement | null;

  /** Human-readable summary for the triage UI */
  message: string;
}

/**
 * Outcome of processing a single ticket. Never mutated after creation.
 */
export interface AssignmentResult {
  ticketId: string;

  status: AssignmentStatus;

  /** Facility the ticket ended at (the last one tried when unassigned) */
  facility: string | null;

  staffId: string | null;

  staffName: string | null;

  /** Round-robin key the allocation advanced */
  fingerprint: string | null;

  /** Index picked from the two lowest-load candidates */
  roundRobinIndex: number | null;

  location: ResolvedLocation | null;

  routingBasis: RoutingBasis | null;

  note: RoutingNote | null;

  reason: UnassignedReason | null;

  geoNearestFacility: string | null;

  distanceToNearestKm: number | null;

  distanceToAssignedKm: number | null;

  decidedAt: string;

  evaluationTimeMs: number;
}

/**
 * Per-ticket failure during a batch run.
 */
export interface BatchFailure {
  ticketId: string;
  code: string;
  reason: string;
}

/**
 * Summary of a batch run through the orchestrator.
 */
export interface BatchResult {
  batchId: string;

  totalTickets: number;

  assigned: number;

  unassigned: number;

  /** Tickets that already had a result and were skipped */
  reused: number;

  failed: number;

  startedAt: string;

  completedAt: string;

  durationMs: number;

  assignedByFacility: Record<string, number>;

  /** Results in input order; failed tickets are absent */
  results: AssignmentResult[];

  /** Per-ticket failures (first 50 max) */
  failures: BatchFailure[];
}

/**
 * Snapshot for monitoring dashboards.
 */
export interface AssignmentStats {
  totalResults: number;
  assigned: number;
  unassigned: number;
  byFacility: Record<string, number>;
  byUnassignedReason: Record<string, number>;
  staffLoads: StaffLoadSummary[];
}
