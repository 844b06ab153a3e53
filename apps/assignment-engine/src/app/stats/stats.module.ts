import { Module } from '@nestjs/common';
import { RoutingModule } from '../routing/routing.module';
import { StaffModule } from '../staff/staff.module';
import { AssignmentStatsService } from './assignment-stats.service';

@Module({
  imports: [RoutingModule, StaffModule],
  providers: [AssignmentStatsService],
  exports: [AssignmentStatsService]
})
export class StatsModule {}
