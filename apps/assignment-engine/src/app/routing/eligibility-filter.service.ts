import { Injectable } from '@nestjs/common';
import {
  EligibilityRequirement,
  POSITION_RANK,
  StaffMember,
  TicketAttributes
} from '@ticket-dispatch/shared-models';

type TicketProfile = Pick<TicketAttributes, 'segment' | 'ticketType' | 'language' | 'sentiment'>;

/**
 * Skill and seniority gate in front of the allocator.
 *
 * Hard requirements must all hold; the negative-sentiment senior preference
 * only narrows a non-empty pool.
 */
@Injectable()
export class EligibilityFilterService {
  /** Hard requirements of a ticket, in evaluation order */
  describeRequirements(ticket: TicketProfile): EligibilityRequirement[] {
    const requirements: EligibilityRequirement[] = [];
    if (ticket.segment === 'VIP' || ticket.segment === 'Priority') requirements.push('VIP_SKILL');
    if (ticket.ticketType === 'DATA_CHANGE') requirements.push('CHIEF_SPECIALIST');
    if (ticket.language === 'KZ') requirements.push('KZ_SKILL');
    if (ticket.language === 'ENG') requirements.push('ENG_SKILL');
    return requirements;
  }

  /** Whether the soft senior preference applies */
  prefersSenior(ticket: TicketProfile): boolean {
    return ticket.sentiment === 'NEGATIVE';
  }

  filter(staff: StaffMember[], ticket: TicketProfile): StaffMember[] {
    const requirements = this.describeRequirements(ticket);
    const eligible = staff.filter((member) =>
      requirements.every((requirement) => this.meets(member, requirement))
    );

    if (eligible.length > 0 && this.prefersSenior(ticket)) {
      const senior = eligible.filter(
        (m) => POSITION_RANK[m.position] >= POSITION_RANK.SENIOR_SPECIALIST
      );
      if (senior.length > 0) return senior;
    }

    return eligible;
  }

  /**
   * The requirement that empties the pool when requirements are applied in
   * order, or null when the pool is eligible or was empty to begin with.
   */
  firstUnmetRequirement(
    staff: StaffMember[],
    ticket: TicketProfile
  ): EligibilityRequirement | null {
    let pool = staff;
    for (const requirement of this.describeRequirements(ticket)) {
      if (pool.length === 0) return null;
      pool = pool.filter((member) => this.meets(member, requirement));
      if (pool.length === 0) return requirement;
    }
    return null;
  }

  private meets(member: StaffMember, requirement: EligibilityRequirement): boolean {
    switch (requirement) {
      case 'VIP_SKILL':
        return member.skills.includes('VIP');
      case 'CHIEF_SPECIALIST':
        return member.position === 'CHIEF_SPECIALIST';
      case 'KZ_SKILL':
        return member.skills.includes('KZ');
      case 'ENG_SKILL':
        return member.skills.includes('ENG');
    }
  }
}
