/**
 * Ticket Interfaces
 * Classified ticket attributes as produced by the classification step.
 */

/** Customer segment */
export type CustomerSegment = 'VIP' | 'Priority' | 'Mass';

/** Ticket category assigned by the classifier */
export type TicketType =
  | 'COMPLAINT'
  | 'DATA_CHANGE'
  | 'CONSULTATION'
  | 'CLAIM'
  | 'APP_MALFUNCTION'
  | 'FRAUD'
  | 'SPAM';

export type Sentiment = 'POSITIVE' | 'NEUTRAL' | 'NEGATIVE';

/** Languages the service desk works in */
export type TicketLanguage = 'RU' | 'KZ' | 'ENG';

/**
 * Raw language labels that may come back from the classifier.
 * Anything outside this table is treated as RU.
 */
export const LANGUAGE_LABELS: Record<string, TicketLanguage> = {
  ru: 'RU',
  kk: 'KZ',
  kz: 'KZ',
  en: 'ENG',
  eng: 'ENG'
};

/**
 * Map a raw language label onto the routing taxonomy.
 */
export function normalizeLanguage(label: string | null | undefined): TicketLanguage {
  if (!label) return 'RU';
  return LANGUAGE_LABELS[label.trim().toLowerCase()] ?? 'RU';
}

/**
 * Location fields as entered by the customer. All optional.
 */
export interface TicketLocation {
  country?: string;
  region?: string;
  city?: string;
  street?: string;
  house?: string;
}

/**
 * Everything the assignment engine knows about a ticket.
 * Immutable for the duration of processing.
 */
export interface TicketAttributes extends TicketLocation {
  /** Unique ticket identifier (customer GUID in the source system) */
  ticketId: string;

  segment: CustomerSegment;

  ticketType: TicketType;

  sentiment: Sentiment;

  language: TicketLanguage;
}
