import 'reflect-metadata';

export * from '@ticket-dispatch/shared-models';
export { AppModule } from './app/app.module';
export type { EngineModuleOptions } from './app/app.module';
export { createEngineContext } from './app/bootstrap';
export type { EngineContextOptions } from './app/bootstrap';
export { validateEnv } from './app/config/env.validation';
export type { EngineEnv } from './app/config/env.validation';
export { InconsistentStateError } from './app/errors/inconsistent-state.error';
export type { InconsistentStateCode } from './app/errors/inconsistent-state.error';
export { GEO_PROVIDER } from './app/geo/geo-provider.client';
export { GeoResolverService } from './app/geo/geo-resolver.service';
export { FacilityLocatorService } from './app/facilities/facility-locator.service';
export { AssignmentOrchestratorService } from './app/routing/assignment-orchestrator.service';
export type { BatchOptions } from './app/routing/assignment-orchestrator.service';
export { StaffRosterService } from './app/staff/staff-roster.service';
export { AssignmentStatsService } from './app/stats/assignment-stats.service';
