/**
 * Reconciliation controller
 *
 * HTTP concerns only: request bodies are validated by the schemas below
 * (through validateRequest) and handed to the reconciliation service.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { CREDITS_FIELD, INVENTORY_FIELD } from '../middlewares/upload';
import {
  generateCreditsDraft,
  getReport,
  listReports,
  runReconciliation,
  type DetectedInput,
  type DocumentedInput,
} from '../services';
import { AppError, asyncHandler, sendSuccess, sendText } from '../utils';

// ============================================
// Schemas
// ============================================

const detectedComponentSchema = z.object({
  name: z.string(),
  versionSpec: z.string().optional(),
  origin: z.string().default('request'),
});

const documentedRecordSchema = z.object({
  name: z.string(),
  version: z.string().default('unknown'),
  url: z.string().optional(),
  rawText: z.string().default(''),
});

// The engine rejects out-of-range thresholds itself, before matching
const matchingOptionsSchema = z.object({
  threshold: z.number().optional(),
  minSubstringLength: z.number().int().positive().optional(),
});

export const reconciliationBodySchema = matchingOptionsSchema
  .extend({
    repoPath: z.string().min(1).optional(),
    detected: z.array(detectedComponentSchema).optional(),
    requirements: z.string().optional(),
    inventoryCsv: z.string().optional(),
    pyproject: z.string().optional(),
    setupPy: z.string().optional(),
    documented: z.array(documentedRecordSchema).optional(),
    credits: z.string().optional(),
  })
  .refine(
    (body) =>
      [body.detected, body.requirements, body.inventoryCsv, body.pyproject, body.setupPy].filter(
        (v) => v !== undefined
      ).length === 1,
    {
      message: 'Provide exactly one of detected, requirements, inventoryCsv, pyproject or setupPy',
      path: ['detected'],
    }
  )
  .refine((body) => body.documented === undefined || body.credits === undefined, {
    message: 'Provide either documented or credits, not both',
    path: ['documented'],
  });

export type ReconciliationBody = z.infer<typeof reconciliationBodySchema>;

// Multipart fields arrive as strings; an empty field means "not given"
const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

export const uploadBodySchema = z.object({
  repoPath: z.string().min(1).optional(),
  threshold: z.preprocess(emptyAsUndefined, z.coerce.number().optional()),
  minSubstringLength: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().optional()
  ),
});

export type UploadBody = z.infer<typeof uploadBodySchema>;

export const draftQuerySchema = z.object({
  project: z.string().min(1).optional(),
});

// ============================================
// Helpers
// ============================================

function detectedFromBody(body: ReconciliationBody): DetectedInput {
  if (body.requirements !== undefined) {
    return { kind: 'requirements', content: body.requirements };
  }
  if (body.inventoryCsv !== undefined) {
    return { kind: 'csv', content: body.inventoryCsv };
  }
  if (body.pyproject !== undefined) {
    return { kind: 'pyproject', content: body.pyproject };
  }
  if (body.setupPy !== undefined) {
    return { kind: 'setup-py', content: body.setupPy };
  }
  return { kind: 'components', components: body.detected ?? [] };
}

function documentedFromBody(body: ReconciliationBody): DocumentedInput | undefined {
  if (body.credits !== undefined) {
    return { kind: 'credits', content: body.credits };
  }
  if (body.documented !== undefined) {
    return { kind: 'records', records: body.documented };
  }
  return undefined;
}

/**
 * Picks one uploaded file out of multer's field map.
 */
function uploadedFile(req: Request, field: string): Express.Multer.File | undefined {
  const { files } = req;
  if (!files || Array.isArray(files)) {
    return undefined;
  }
  return files[field]?.[0];
}

/**
 * Last path segment of the repository, e.g. "/srv/repos/billing" → "billing"
 */
export function projectNameFromPath(repoPath: string): string {
  const segment = repoPath.split(/[\\/]/).filter((part) => part && part !== '.').pop();
  return segment ?? 'this project';
}

/**
 * Picks the parser from the file name: .csv, .toml (pyproject) and .py
 * (setup.py); anything else is read as a requirements file.
 */
export function inventoryFromFile(
  file: Pick<Express.Multer.File, 'buffer' | 'originalname'>
): DetectedInput {
  const content = file.buffer.toString('utf8');
  const source = file.originalname;
  const name = source.toLowerCase();

  if (name.endsWith('.csv')) {
    return { kind: 'csv', content, source };
  }
  if (name.endsWith('.toml')) {
    return { kind: 'pyproject', content, source };
  }
  if (name.endsWith('.py')) {
    return { kind: 'setup-py', content, source };
  }
  return { kind: 'requirements', content, source };
}

// ============================================
// Controller
// ============================================

export class ReconciliationController {
  /**
   * POST /reconciliation
   * Reconcile components given as JSON
   */
  create = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: ReconciliationBody = req.body;

    const report = await runReconciliation({
      repoPath: body.repoPath,
      detected: detectedFromBody(body),
      documented: documentedFromBody(body),
      threshold: body.threshold,
      minSubstringLength: body.minSubstringLength,
    });

    sendSuccess(res, report, 'Reconciliation completed', 201);
  });

  /**
   * POST /reconciliation/upload
   * Reconcile an uploaded inventory (requirements.txt or CSV) against an
   * optional uploaded software_credits file
   */
  upload = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: UploadBody = req.body;

    const inventory = uploadedFile(req, INVENTORY_FIELD);
    if (!inventory) {
      throw AppError.badRequest(`Missing "${INVENTORY_FIELD}" file`);
    }

    const credits = uploadedFile(req, CREDITS_FIELD);

    const report = await runReconciliation({
      repoPath: body.repoPath,
      detected: inventoryFromFile(inventory),
      documented: credits ? { kind: 'credits', content: credits.buffer.toString('utf8') } : undefined,
      threshold: body.threshold,
      minSubstringLength: body.minSubstringLength,
    });

    sendSuccess(res, report, 'Reconciliation completed', 201);
  });

  /**
   * GET /reconciliation
   * List stored reports (summaries only)
   */
  list = asyncHandler((_req: Request, res: Response): void => {
    const reports = listReports();
    sendSuccess(res, { reports, total: reports.length });
  });

  /**
   * GET /reconciliation/:reportId
   */
  get = asyncHandler((req: Request, res: Response): void => {
    sendSuccess(res, getReport(req.params.reportId));
  });

  /**
   * GET /reconciliation/:reportId/draft
   * Draft software_credits file for the report
   */
  draft = asyncHandler((req: Request, res: Response): void => {
    const report = getReport(req.params.reportId);
    const { project } = req.query;

    const projectName = typeof project === 'string' ? project : projectNameFromPath(report.repoPath);

    sendText(res, generateCreditsDraft(report, projectName), 'software_credits');
  });
}

export const reconciliationController = new ReconciliationController();

export default reconciliationController;
