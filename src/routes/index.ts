import { Router } from 'express';
import healthRoutes from './health.routes';
import reconciliationRoutes from './reconciliation.routes';
import creditsRoutes from './credits.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Reconciliation runs and stored reports
router.use('/reconciliation', reconciliationRoutes);

// software_credits utilities
router.use('/credits', creditsRoutes);

export default router;
