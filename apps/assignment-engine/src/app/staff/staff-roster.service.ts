import { Injectable, Logger } from '@nestjs/common';
import { StaffLoadSummary, StaffMember } from '@ticket-dispatch/shared-models';
import { InconsistentStateError } from '../errors/inconsistent-state.error';
import { ReferenceDataService } from '../reference-data/reference-data.service';
import { validateRecords } from '../reference-data/validate-records';
import { StaffRecordDto } from './staff-record.dto';

/** Mutex key guarding one staff member's load */
export function staffLockKey(staffId: string): string {
  return `staff:${staffId}`;
}

/**
 * In-process roster and load ledger.
 *
 * The persistence layer owns the roster and hands it over with `loadRoster`.
 * From then on loads change only through `incrementLoad` / `decrementLoad`,
 * which callers invoke while holding `staffLockKey(id)`.
 */
@Injectable()
export class StaffRosterService {
  private readonly logger = new Logger(StaffRosterService.name);

  /** staffId → member (internal mutable copy) */
  private members = new Map<string, StaffMember>();

  /** staffId → load at the time the roster was loaded */
  private priorLoads = new Map<string, number>();

  /** staffId → tickets assigned since the roster was loaded */
  private assignedCounts = new Map<string, number>();

  constructor(private readonly referenceData: ReferenceDataService) {}

  /**
   * Replace the roster. Rows are shape-validated; facility membership and
   * load sign are reported here and enforced when a ticket is processed.
   */
  loadRoster(rows: unknown[]): number {
    const records = validateRecords(StaffRecordDto, rows, 'staff roster');
    const next = new Map<string, StaffMember>();

    for (const record of records) {
      if (next.has(record.id)) {
        throw new InconsistentStateError(
          `Duplicate staff id in roster: ${record.id}`,
          'DUPLICATE_STAFF',
          { staffId: record.id }
        );
      }
      next.set(record.id, {
        id: record.id,
        fullName: record.fullName,
        facility: record.facility,
        position: record.position,
        skills: [...new Set(record.skills)],
        currentLoad: record.currentLoad
      });
    }

    this.members = next;
    this.priorLoads = new Map(Array.from(next.values(), (m) => [m.id, m.currentLoad]));
    this.assignedCounts = new Map();

    const problems = this.findInconsistencies();
    if (problems.length > 0) {
      this.logger.warn(
        `Roster loaded with ${problems.length} inconsistent member(s): ` +
          problems.map((p) => p.message).join('; ')
      );
    }

    this.logger.log(`Roster loaded: ${next.size} staff members`);
    return next.size;
  }

  getById(staffId: string): StaffMember | undefined {
    const member = this.members.get(staffId);
    return member ? this.copy(member) : undefined;
  }

  getAll(): StaffMember[] {
    return Array.from(this.members.values(), (m) => this.copy(m));
  }

  getByFacility(facility: string): StaffMember[] {
    return this.getAll().filter((m) => m.facility === facility);
  }

  /** Sum of current load over the facility's roster */
  facilityLoad(facility: string): number {
    let total = 0;
    for (const member of this.members.values()) {
      if (member.facility === facility) total += member.currentLoad;
    }
    return total;
  }

  currentLoad(staffId: string): number {
    return this.require(staffId).currentLoad;
  }

  /**
   * Add one ticket to a member's load. Caller holds `staffLockKey(staffId)`.
   */
  incrementLoad(staffId: string): StaffMember {
    const member = this.require(staffId);
    member.currentLoad += 1;
    this.assignedCounts.set(staffId, (this.assignedCounts.get(staffId) ?? 0) + 1);
    this.logger.debug(`Staff ${staffId} load → ${member.currentLoad}`);
    return this.copy(member);
  }

  /**
   * Take back one ticket (released assignment). Caller holds `staffLockKey(staffId)`.
   */
  decrementLoad(staffId: string): StaffMember {
    const member = this.require(staffId);
    if (member.currentLoad <= 0) {
      throw new InconsistentStateError(
        `Cannot release a ticket from staff ${staffId}: load is already ${member.currentLoad}`,
        'NEGATIVE_LOAD',
        { staffId }
      );
    }

    member.currentLoad -= 1;
    const assigned = this.assignedCounts.get(staffId) ?? 0;
    if (assigned > 0) {
      this.assignedCounts.set(staffId, assigned - 1);
    }
    return this.copy(member);
  }

  /**
   * Throw the first inconsistency found. Run before any mutation for a ticket.
   */
  assertConsistent(): void {
    const [first] = this.findInconsistencies();
    if (first) throw first;
  }

  /** Per-member load split for monitoring */
  snapshot(): StaffLoadSummary[] {
    return Array.from(this.members.values(), (m) => ({
      id: m.id,
      fullName: m.fullName,
      facility: m.facility,
      position: m.position,
      skills: [...m.skills],
      load: m.currentLoad,
      priorLoad: this.priorLoads.get(m.id) ?? m.currentLoad,
      assignedCount: this.assignedCounts.get(m.id) ?? 0
    })).sort((a, b) => b.load - a.load || a.id.localeCompare(b.id));
  }

  private findInconsistencies(): InconsistentStateError[] {
    const problems: InconsistentStateError[] = [];

    for (const member of this.members.values()) {
      if (!this.referenceData.hasFacility(member.facility)) {
        problems.push(
          new InconsistentStateError(
            `Staff ${member.id} references unknown facility "${member.facility}"`,
            'UNKNOWN_FACILITY',
            { staffId: member.id, facility: member.facility }
          )
        );
      }
      if (member.currentLoad < 0) {
        problems.push(
          new InconsistentStateError(
            `Staff ${member.id} has negative load ${member.currentLoad}`,
            'NEGATIVE_LOAD',
            { staffId: member.id, facility: member.facility }
          )
        );
      }
    }

    return problems;
  }

  private require(staffId: string): StaffMember {
    const member = this.members.get(staffId);
    if (!member) {
      throw new InconsistentStateError(`Unknown staff member: ${staffId}`, 'UNKNOWN_STAFF', {
        staffId
      });
    }
    return member;
  }

  private copy(member: StaffMember): StaffMember {
    return { ...member, skills: [...member.skills] };
  }
}
