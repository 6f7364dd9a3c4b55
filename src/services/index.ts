export { healthService, HealthService } from './health.service';
export * from './reconciliation.service';
export { generateCreditsDraft, formatSectionHeader } from './creditsDraft.service';
