import type { FeedbackStore } from '../database.js';
import type {
  PredictionRecord,
  PredictionStatistics,
  RecentPredictionItem,
} from '../types/prediction.js';

export const DEFAULT_RECENT_LIMIT = 10;
export const MAX_RECENT_LIMIT = 100;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function pct(part: number, whole: number): number {
  return whole > 0 ? round2((part / whole) * 100) : 0;
}

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_RECENT_LIMIT;
  return Math.min(Math.max(Math.floor(limit), 1), MAX_RECENT_LIMIT);
}

/**
 * Public view of a record. The filename is only disclosed for records stored
 * with consent; comments are never listed.
 */
export function toRecentItem(record: PredictionRecord): RecentPredictionItem {
  return {
    id: record.id,
    timestamp: record.timestamp,
    prediction_result: record.predictionResult,
    proba_cat: record.probaCat,
    proba_dog: record.probaDog,
    inference_time_ms: record.inferenceTimeMs,
    success: record.success,
    rgpd_consent: record.rgpdConsent,
    user_feedback: record.userFeedback ?? null,
    filename: record.rgpdConsent ? record.filename ?? null : null,
  };
}

export class StatisticsService {
  constructor(private readonly store: FeedbackStore) {}

  getStatistics(): PredictionStatistics {
    const counts = this.store.countPredictions();
    const feedbackCount = counts.positiveFeedback + counts.negativeFeedback;

    return {
      total_predictions: counts.total,
      successful_predictions: counts.successes,
      failed_predictions: counts.total - counts.successes,
      avg_inference_time_ms: round2(counts.avgInferenceTimeMs),
      success_rate_pct: pct(counts.successes, counts.total),
      feedback_count: feedbackCount,
      satisfaction_rate_pct: pct(counts.positiveFeedback, feedbackCount),
      predictions_by_class: { ...counts.byClass },
    };
  }

  getRecentPredictions(limit?: number): { predictions: RecentPredictionItem[]; count: number } {
    const predictions = this.store.getRecent(clampLimit(limit)).map(toRecentItem);
    return { predictions, count: predictions.length };
  }
}
