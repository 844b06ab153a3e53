import { Injectable, Logger } from '@nestjs/common';
import { StaffMember } from '@ticket-dispatch/shared-models';
import { KeyedMutex } from '../staff/keyed-mutex';
import { StaffRosterService, staffLockKey } from '../staff/staff-roster.service';

export interface AllocationOutcome {
  staff: StaffMember;

  /** 0 or 1: position of the pick in the load-ordered shortlist */
  roundRobinIndex: number;

  fingerprint: string;
}

/** Mutex key guarding one fingerprint's counter */
export function counterLockKey(fingerprint: string): string {
  return `rr:${fingerprint}`;
}

/**
 * Least-loaded-then-alternate allocator.
 *
 * The shortlist is the two lowest-load members of the pool (ties by id). The
 * less loaded one wins; when both carry the same load the pick is
 * `counter % 2`, with one counter per eligibility fingerprint that advances on
 * every two-candidate allocation. Two members starting level therefore
 * alternate strictly.
 *
 * Picking, the counter step and the load increment happen in one critical
 * section over the counter and every pool member.
 */
@Injectable()
export class FairnessAllocatorService {
  private readonly logger = new Logger(FairnessAllocatorService.name);

  /** fingerprint → allocations made from a two-candidate shortlist */
  private counters = new Map<string, number>();

  constructor(
    private readonly roster: StaffRosterService,
    private readonly mutex: KeyedMutex
  ) {}

  /**
   * Pick and charge one member of the pool. Null when the pool is empty.
   */
  async allocate(pool: StaffMember[], fingerprint: string): Promise<AllocationOutcome | null> {
    if (pool.length === 0) return null;

    const keys = [counterLockKey(fingerprint), ...pool.map((m) => staffLockKey(m.id))];

    return this.mutex.runExclusive(keys, () => {
      const shortlist = pool
        .map((member) => ({ id: member.id, load: this.roster.currentLoad(member.id) }))
        .sort((a, b) => a.load - b.load || a.id.localeCompare(b.id))
        .slice(0, 2);

      let index = 0;
      if (shortlist.length > 1) {
        const counter = this.counters.get(fingerprint) ?? 0;
        if (shortlist[0].load === shortlist[1].load) {
          index = counter % 2;
        }
        this.counters.set(fingerprint, counter + 1);
      }

      const staff = this.roster.incrementLoad(shortlist[index].id);
      this.logger.debug(
        `[${fingerprint}] shortlist=${shortlist.map((c) => `${c.id}:${c.load}`).join(',')} ` +
          `→ ${staff.id} (index ${index})`
      );

      return { staff, roundRobinIndex: index, fingerprint };
    });
  }

  /** Current counter for a fingerprint (0 when never advanced) */
  counterFor(fingerprint: string): number {
    return this.counters.get(fingerprint) ?? 0;
  }

  reset(): void {
    this.counters = new Map();
    this.logger.log('Round-robin counters reset');
  }
}
