export { healthController, HealthController } from './health.controller';
export { reconciliationController, ReconciliationController } from './reconciliation.controller';
export { creditsController, CreditsController } from './credits.controller';
