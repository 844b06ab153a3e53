import { TicketAttributes } from '@ticket-dispatch/shared-models';

/**
 * Round-robin key describing the eligibility pool rather than the ticket.
 * Tickets competing for the same managers share a key, so they share a counter.
 */
export function buildFingerprint(
  facility: string,
  ticket: Pick<TicketAttributes, 'segment' | 'ticketType' | 'language' | 'sentiment'>
): string {
  const vip = ticket.segment === 'VIP' || ticket.segment === 'Priority';
  const dataChange = ticket.ticketType === 'DATA_CHANGE';
  const senior = ticket.sentiment === 'NEGATIVE';

  return `${facility}|vip=${vip}|data=${dataChange}|lang=${ticket.language}|senior=${senior}`;
}
