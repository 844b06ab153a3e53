import { DynamicModule, Module } from '@nestjs/common';
import { GeoProviderQuery } from '@ticket-dispatch/shared-models';
import { ReferenceDataModule } from '../reference-data/reference-data.module';
import { GEO_PROVIDER, GEO_RATE_LIMIT_CLOCK, GeoProviderClient } from './geo-provider.client';
import { GeoResolverService } from './geo-resolver.service';
import { systemClock } from './provider-rate-limiter';

@Module({})
export class GeoModule {
  /**
   * Registered once by the root module and visible app-wide.
   *
   * @param provider the integration layer's `queryProvider`; omit to run on
   * the offline tables only
   */
  static register(provider?: GeoProviderQuery | null): DynamicModule {
    return {
      module: GeoModule,
      global: true,
      imports: [ReferenceDataModule],
      providers: [
        { provide: GEO_PROVIDER, useValue: provider ?? null },
        { provide: GEO_RATE_LIMIT_CLOCK, useValue: systemClock },
        GeoProviderClient,
        GeoResolverService
      ],
      exports: [GeoResolverService]
    };
  }
}
