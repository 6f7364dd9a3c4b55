import { Router } from 'express';
import { creditsController } from '../controllers';
import { parseCreditsBodySchema } from '../controllers/credits.controller';
import { validateRequest } from '../middlewares';

const router = Router();

/**
 * @route   POST /credits/parse
 * @desc    Parse software_credits text into documented records
 * @access  Public
 */
router.post('/parse', validateRequest({ body: parseCreditsBodySchema }), creditsController.parse);

export default router;
