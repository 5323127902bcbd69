/**
 * POST /api/predict - multipart image upload through the inference orchestrator
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { InferenceOrchestrator } from '../services/inference.js';

const CONSENT_VALUES = new Set(['true', '1', 'on', 'yes']);

/**
 * Form checkboxes arrive as strings; anything but an explicit yes is no consent.
 */
export function parseConsent(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1;
  if (typeof value !== 'string') return false;
  return CONSENT_VALUES.has(value.trim().toLowerCase());
}

export function createPredictHandler(orchestrator: InferenceOrchestrator): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const file = req.file;
      const body: Record<string, unknown> = req.body ?? {};
      const result = await orchestrator.predict({
        image: file?.buffer,
        mimeType: file?.mimetype,
        filename: file?.originalname,
        rgpdConsent: parseConsent(body.rgpd_consent),
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  };
}
