import { Router, Request, Response } from 'express';
import { ComparisonService } from '../services/comparison.service.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import { comparisonRequestSchema, formatIssues } from './schemas.js';

const router = Router();

/**
 * POST /api/comparison
 * Compare a new combination-matrix export against an older one
 */
router.post('/', (req: Request, res: Response) => {
  try {
    const parsed = comparisonRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid comparison request', details: formatIssues(parsed.error) });
    }

    const result = ComparisonService.compareSnapshots({
      newGrid: parsed.data.newGrid,
      oldGrid: parsed.data.oldGrid,
      topN: parsed.data.topN ?? env.TOP_MOVERS_LIMIT,
    });

    res.status(result.success ? 200 : 422).json(result);
  } catch (error) {
    logger.error('Error comparing snapshots', { error });
    res.status(500).json({ error: 'Internal server error' });
  }
});

export default router;
