import { randomUUID } from 'crypto';
import { Router, Request, Response } from 'express';
import { ThankYouStoreService } from '../services/thank-you-store.service.js';
import { isDatabaseConfigured } from '../config/env.js';
import { logger } from '../config/logger.js';
import { thankYouRequestSchema, formatIssues } from './schemas.js';
import { runRequestedAnalysis } from './analysis.js';

const router = Router();

/**
 * POST /api/thank-yous
 * Analyse the uploaded rows and persist the extracted thank-you slips
 */
router.post('/', async (req: Request, res: Response) => {
  try {
    if (!isDatabaseConfigured()) {
      return res.status(503).json({ error: 'Thank-you store is not configured' });
    }

    const parsed = thankYouRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid thank-you request', details: formatIssues(parsed.error) });
    }

    const result = runRequestedAnalysis(parsed.data);
    if (!result.success) {
      return res.status(422).json({ success: false, errors: result.errors, warnings: result.warnings });
    }

    const runId = parsed.data.runId ?? randomUUID();
    const stored = await ThankYouStoreService.saveAll(runId, result.relations.thankYous);

    res.status(201).json({ success: true, runId, stored, warnings: result.warnings });
  } catch (error) {
    logger.error('Error storing thank-you slips', { error });
    res.status(500).json({ error: 'Internal server error' });
  }
});

/**
 * GET /api/thank-yous/:receiverKey
 */
router.get('/:receiverKey', async (req: Request, res: Response) => {
  try {
    if (!isDatabaseConfigured()) {
      return res.status(503).json({ error: 'Thank-you store is not configured' });
    }

    const slips = await ThankYouStoreService.listByReceiver(req.params.receiverKey);
    res.json({ slips });
  } catch (error) {
    logger.error('Error listing thank-you slips', { error });
    res.status(500).json({ error: 'Internal server error' });
  }
});

/**
 * DELETE /api/thank-yous/runs/:runId
 * Remove the slips stored for one run
 */
router.delete('/runs/:runId', async (req: Request, res: Response) => {
  try {
    if (!isDatabaseConfigured()) {
      return res.status(503).json({ error: 'Thank-you store is not configured' });
    }

    const removed = await ThankYouStoreService.clear(req.params.runId);
    res.json({ runId: req.params.runId, removed });
  } catch (error) {
    logger.error('Error removing thank-you slips', { error });
    res.status(500).json({ error: 'Internal server error' });
  }
});

export default router;
