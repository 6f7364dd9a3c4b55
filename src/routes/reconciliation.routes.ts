/**
 * Reconciliation API Routes
 *
 * Endpoints:
 * - POST /              - Reconcile components given as JSON
 * - POST /upload        - Reconcile uploaded inventory + software_credits files
 * - GET  /              - List stored reports
 * - GET  /:reportId     - Get a stored report
 * - GET  /:reportId/draft - Draft software_credits for a report
 */

import { Router } from 'express';
import {
  reconciliationController,
  draftQuerySchema,
  reconciliationBodySchema,
  uploadBodySchema,
} from '../controllers/reconciliation.controller';
import { uploadCreditsFiles, validateRequest } from '../middlewares';
import { commonSchemas } from '../middlewares/validateRequest';

const router = Router();

/**
 * @route   POST /reconciliation
 * @desc    Reconcile detected components against documented records
 * @access  Public
 *
 * Body:
 * - detected | requirements | inventoryCsv | pyproject | setupPy (exactly one)
 * - documented | credits (optional; absent means no software_credits file)
 * - threshold, minSubstringLength, repoPath (optional)
 *
 * Response:
 * - 201 Created: ReconciliationReport
 * - 400 Bad Request: validation failure or threshold outside [0, 1]
 */
router.post(
  '/',
  validateRequest({ body: reconciliationBodySchema }),
  reconciliationController.create
);

/**
 * @route   POST /reconciliation/upload
 * @desc    Reconcile uploaded files
 * @access  Public
 *
 * Multipart fields:
 * - inventory: requirements.txt, inventory .csv, pyproject.toml or setup.py (required)
 * - credits: software_credits file (optional)
 * - threshold, minSubstringLength, repoPath (optional)
 */
router.post(
  '/upload',
  uploadCreditsFiles,
  validateRequest({ body: uploadBodySchema }),
  reconciliationController.upload
);

/**
 * @route   GET /reconciliation
 * @desc    List stored reports, newest first
 * @access  Public
 */
router.get('/', reconciliationController.list);

/**
 * @route   GET /reconciliation/:reportId
 * @desc    Get a stored report
 * @access  Public
 */
router.get(
  '/:reportId',
  validateRequest({ params: commonSchemas.reportId }),
  reconciliationController.get
);

/**
 * @route   GET /reconciliation/:reportId/draft
 * @desc    Download a draft software_credits file
 * @access  Public
 *
 * Query params:
 * - project: string (optional, name used in the file header)
 */
router.get(
  '/:reportId/draft',
  validateRequest({ params: commonSchemas.reportId, query: draftQuerySchema }),
  reconciliationController.draft
);

export default router;
