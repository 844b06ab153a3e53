import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GeoProviderQuery } from '@ticket-dispatch/shared-models';
import { validateEnv } from './config/env.validation';
import { FacilitiesModule } from './facilities/facilities.module';
import { GeoModule } from './geo/geo.module';
import { ReferenceDataModule } from './reference-data/reference-data.module';
import { RoutingModule } from './routing/routing.module';
import { StaffModule } from './staff/staff.module';
import { StatsModule } from './stats/stats.module';

export interface EngineModuleOptions {
  /** Geocoding collaborator; the engine runs on offline tables without it */
  geoProvider?: GeoProviderQuery | null;

  /** Variables layered over process.env (tests, embedding hosts) */
  env?: Record<string, string>;
}

@Module({})
export class AppModule {
  static forRoot(options: EngineModuleOptions = {}): DynamicModule {
    const overrides = options.env ?? {};

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: (config: Record<string, unknown>) => validateEnv({ ...config, ...overrides })
        }),
        GeoModule.register(options.geoProvider),
        ReferenceDataModule,
        StaffModule,
        FacilitiesModule,
        RoutingModule,
        StatsModule
      ]
    };
  }
}
