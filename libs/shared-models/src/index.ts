export * from './lib/ticket.interface';
export * from './lib/facility.interface';
export * from './lib/staff.interface';
export * from './lib/geo.interface';
export * from './lib/assignment.interface';
