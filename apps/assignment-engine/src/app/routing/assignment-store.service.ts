import { Injectable, Logger } from '@nestjs/common';
import { AssignmentResult } from '@ticket-dispatch/shared-models';

/**
 * Assignment results by ticket id. One result per ticket; a result is never
 * changed once stored, only removed by an explicit release.
 */
@Injectable()
export class AssignmentStoreService {
  private readonly logger = new Logger(AssignmentStoreService.name);

  /** ticketId → result */
  private readonly results = new Map<string, AssignmentResult>();

  /** Get a result by ticket ID */
  get(ticketId: string): AssignmentResult | undefined {
    return this.results.get(ticketId);
  }

  has(ticketId: string): boolean {
    return this.results.has(ticketId);
  }

  /**
   * Store a result. The first result for a ticket wins; a later one for the
   * same ticket is dropped and the stored one returned.
   */
  record(result: AssignmentResult): AssignmentResult {
    const existing = this.results.get(result.ticketId);
    if (existing) {
      this.logger.warn(`Result for ${result.ticketId} already stored; keeping the first`);
      return existing;
    }

    const frozen = Object.freeze({ ...result });
    this.results.set(result.ticketId, frozen);
    this.logger.debug(`Result stored: ${result.ticketId} (${result.status})`);
    return frozen;
  }

  remove(ticketId: string): AssignmentResult | undefined {
    const existing = this.results.get(ticketId);
    this.results.delete(ticketId);
    return existing;
  }

  getAll(): AssignmentResult[] {
    return Array.from(this.results.values());
  }

  /** Total results in store */
  get size(): number {
    return this.results.size;
  }
}
