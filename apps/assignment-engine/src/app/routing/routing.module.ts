import { Module } from '@nestjs/common';
import { FacilitiesModule } from '../facilities/facilities.module';
import { StaffModule } from '../staff/staff.module';
import { AssignmentOrchestratorService } from './assignment-orchestrator.service';
import { AssignmentStoreService } from './assignment-store.service';
import { EligibilityFilterService } from './eligibility-filter.service';
import { FairnessAllocatorService } from './fairness-allocator.service';

/**
 * Assignment cascade. GeoResolverService comes from the global GeoModule
 * registered by the root module.
 */
@Module({
  imports: [StaffModule, FacilitiesModule],
  providers: [
    EligibilityFilterService,
    FairnessAllocatorService,
    AssignmentStoreService,
    AssignmentOrchestratorService
  ],
  exports: [AssignmentOrchestratorService, AssignmentStoreService, EligibilityFilterService]
})
export class RoutingModule {}
