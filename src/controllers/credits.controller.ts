import { Request, Response } from 'express';
import { z } from 'zod';
import { parseSoftwareCredits } from '../parsers/softwareCredits';
import { asyncHandler, sendSuccess } from '../utils';

export const parseCreditsBodySchema = z.object({
  text: z.string(),
});

type ParseCreditsBody = z.infer<typeof parseCreditsBodySchema>;

/**
 * software_credits controller
 */
export class CreditsController {
  /**
   * POST /credits/parse
   * Split a software_credits file into documented component records
   */
  parse = asyncHandler((req: Request, res: Response): void => {
    const { text }: ParseCreditsBody = req.body;
    const parsed = parseSoftwareCredits(text);

    sendSuccess(res, { ...parsed, total: parsed.components.length });
  });
}

export const creditsController = new CreditsController();

export default creditsController;
