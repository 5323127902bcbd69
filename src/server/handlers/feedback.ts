/**
 * POST /api/feedback - amends a stored prediction with the user's verdict
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { InvalidInputError } from '../errors.js';
import type { InferenceOrchestrator } from '../services/inference.js';
import type { FeedbackUpdate, FeedbackValue } from '../types/prediction.js';

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function parseFeedbackId(value: unknown): number {
  const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  if (!/^\d+$/.test(text)) {
    throw new InvalidInputError('feedback_id must be a positive integer');
  }
  const id = Number(text);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new InvalidInputError('feedback_id must be a positive integer');
  }
  return id;
}

/**
 * Only 0 (unsatisfied) and 1 (satisfied) are accepted; other values are
 * rejected rather than clamped.
 */
export function parseUserFeedback(value: unknown): FeedbackValue | undefined {
  if (isBlank(value)) return undefined;
  const text = typeof value === 'string' ? value.trim() : String(value);
  if (text === '0') return 0;
  if (text === '1') return 1;
  throw new InvalidInputError('user_feedback must be 0 or 1');
}

export function parseUserComment(value: unknown): string | undefined {
  if (isBlank(value)) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidInputError('user_comment must be text');
  }
  return value;
}

export function createFeedbackHandler(orchestrator: InferenceOrchestrator): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const feedbackId = parseFeedbackId(body.feedback_id);
      const update: FeedbackUpdate = {
        userFeedback: parseUserFeedback(body.user_feedback),
        userComment: parseUserComment(body.user_comment),
      };

      orchestrator.amendFeedback(feedbackId, update);
      res.json({ success: true, message: 'Feedback saved' });
    } catch (error) {
      next(error);
    }
  };
}
