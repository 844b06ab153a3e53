import { Module } from '@nestjs/common';
import { ReferenceDataModule } from '../reference-data/reference-data.module';
import { KeyedMutex } from './keyed-mutex';
import { StaffRosterService } from './staff-roster.service';

@Module({
  imports: [ReferenceDataModule],
  providers: [StaffRosterService, KeyedMutex],
  exports: [StaffRosterService, KeyedMutex]
})
export class StaffModule {}
