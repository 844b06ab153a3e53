/**
 * Staff Interfaces
 * Service-desk managers, their seniority and skills.
 */

export type StaffPosition = 'SPECIALIST' | 'SENIOR_SPECIALIST' | 'CHIEF_SPECIALIST';

/** Seniority order, higher is more senior */
export const POSITION_RANK: Record<StaffPosition, number> = {
  SPECIALIST: 1,
  SENIOR_SPECIALIST: 2,
  CHIEF_SPECIALIST: 3
};

export type StaffSkill = 'VIP' | 'KZ' | 'ENG';

export interface StaffMember {
  /** Unique identifier */
  id: string;

  fullName: string;

  /** Name of the facility this member works at */
  facility: string;

  position: StaffPosition;

  skills: StaffSkill[];

  /** Tickets currently in work; mutated only by the allocator */
  currentLoad: number;
}

/**
 * Per-member load split for monitoring.
 */
export interface StaffLoadSummary {
  id: string;
  fullName: string;
  facility: string;
  position: StaffPosition;
  skills: StaffSkill[];

  /** Load now */
  load: number;

  /** Load when the roster was loaded */
  priorLoad: number;

  /** Tickets assigned during this process lifetime */
  assignedCount: number;
}
