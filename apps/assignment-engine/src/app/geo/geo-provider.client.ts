import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GeoPoint, GeoProviderQuery } from '@ticket-dispatch/shared-models';
import { ProviderRateLimiter, RateLimiterClock, systemClock } from './provider-rate-limiter';

/** Injection token for the integration layer's `queryProvider(text)` */
export const GEO_PROVIDER = 'GEO_PROVIDER';

/** Injection token for the rate limiter's clock (tests swap it) */
export const GEO_RATE_LIMIT_CLOCK = 'GEO_RATE_LIMIT_CLOCK';

export type ProviderOutcome =
  | { kind: 'hit'; point: GeoPoint }
  | { kind: 'miss' }
  | { kind: 'error'; message: string }
  | { kind: 'disabled' };

/**
 * Rate-limited wrapper around the external geocoding provider.
 * Provider failures come back as outcomes, never as exceptions.
 */
@Injectable()
export class GeoProviderClient {
  private readonly logger = new Logger(GeoProviderClient.name);

  private readonly limiter: ProviderRateLimiter;

  private missingProviderWarned = false;

  constructor(
    config: ConfigService,
    @Optional()
    @Inject(GEO_PROVIDER)
    private readonly provider?: GeoProviderQuery | null,
    @Inject(GEO_RATE_LIMIT_CLOCK)
    clock?: RateLimiterClock
  ) {
    const minIntervalMs = config.get<number>('GEO_PROVIDER_MIN_INTERVAL_MS') ?? 250;
    this.limiter = new ProviderRateLimiter(minIntervalMs, clock ?? systemClock);
  }

  async query(text: string): Promise<ProviderOutcome> {
    const provider = this.provider;
    if (typeof provider !== 'function') {
      if (!this.missingProviderWarned) {
        this.logger.warn('No geocoding provider configured: provider tiers will be skipped');
        this.missingProviderWarned = true;
      }
      return { kind: 'disabled' };
    }

    try {
      const point = await this.limiter.schedule(() => provider(text));
      if (!point || !Number.isFinite(point.lat) || !Number.isFinite(point.lon)) {
        return { kind: 'miss' };
      }

      this.logger.debug(`Provider: '${text}' → (${point.lat.toFixed(4)}, ${point.lon.toFixed(4)})`);
      return { kind: 'hit', point: { lat: point.lat, lon: point.lon } };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Provider error for '${text}': ${message}`);
      return { kind: 'error', message };
    }
  }
}
