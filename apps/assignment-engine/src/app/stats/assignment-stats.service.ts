import { Injectable } from '@nestjs/common';
import { AssignmentStats } from '@ticket-dispatch/shared-models';
import { AssignmentStoreService } from '../routing/assignment-store.service';
import { StaffRosterService } from '../staff/staff-roster.service';

/**
 * Read-only view over stored results and the load ledger.
 */
@Injectable()
export class AssignmentStatsService {
  constructor(
    private readonly store: AssignmentStoreService,
    private readonly roster: StaffRosterService
  ) {}

  getStats(): AssignmentStats {
    const byFacility: Record<string, number> = {};
    const byUnassignedReason: Record<string, number> = {};
    let assigned = 0;
    let unassigned = 0;

    for (const result of this.store.getAll()) {
      if (result.status === 'ASSIGNED') {
        assigned++;
        if (result.facility) {
          byFacility[result.facility] = (byFacility[result.facility] || 0) + 1;
        }
      } else {
        unassigned++;
        const reason = result.reason ?? 'UNKNOWN';
        byUnassignedReason[reason] = (byUnassignedReason[reason] || 0) + 1;
      }
    }

    return {
      totalResults: this.store.size,
      assigned,
      unassigned,
      byFacility,
      byUnassignedReason,
      staffLoads: this.roster.snapshot()
    };
  }
}
