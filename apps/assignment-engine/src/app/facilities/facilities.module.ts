import { Module } from '@nestjs/common';
import { ReferenceDataModule } from '../reference-data/reference-data.module';
import { StaffModule } from '../staff/staff.module';
import { FacilityLocatorService } from './facility-locator.service';

@Module({
  imports: [ReferenceDataModule, StaffModule],
  providers: [FacilityLocatorService],
  exports: [FacilityLocatorService]
})
export class FacilitiesModule {}
