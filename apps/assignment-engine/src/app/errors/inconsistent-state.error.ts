export type InconsistentStateCode =
  | 'UNKNOWN_FACILITY'
  | 'UNKNOWN_STAFF'
  | 'NEGATIVE_LOAD'
  | 'DUPLICATE_STAFF'
  | 'INVALID_REFERENCE_DATA';

export interface InconsistentStateDetails {
  staffId?: string;
  facility?: string;
  ticketId?: string;
}

/**
 * Thrown when reference or roster data contradicts itself.
 * Indicates upstream corruption; the only error `process` lets escape.
 */
export class InconsistentStateError extends Error {
  constructor(
    message: string,
    public readonly code: InconsistentStateCode,
    public readonly details: InconsistentStateDetails = {}
  ) {
    super(message);
    this.name = 'InconsistentStateError';
  }
}
