import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_REFERENCE_DIR,
  REFERENCE_TABLES,
  loadReferenceTables
} from './reference-data.loader';
import { ReferenceDataService } from './reference-data.service';

@Module({
  providers: [
    {
      provide: REFERENCE_TABLES,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        loadReferenceTables(config.get<string>('ROUTING_REFERENCE_DIR') ?? DEFAULT_REFERENCE_DIR)
    },
    ReferenceDataService
  ],
  exports: [ReferenceDataService]
})
export class ReferenceDataModule {}
