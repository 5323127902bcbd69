export type PetClass = 'cat' | 'dog';
export type PredictionResult = PetClass | 'error';
export type FeedbackValue = 0 | 1;
export type FeedbackPolarity = 'positive' | 'negative';

// One row per inference attempt
export interface PredictionRecord {
  id: number;
  timestamp: string;
  success: boolean;
  predictionResult: PredictionResult;
  probaCat: number;
  probaDog: number;
  inferenceTimeMs: number;
  rgpdConsent: boolean;
  filename?: string;
  userFeedback?: FeedbackValue;
  userComment?: string;
}

export interface PredictionAttempt {
  success: boolean;
  predictionResult: PredictionResult;
  probaCat: number;
  probaDog: number;
  inferenceTimeMs: number;
  rgpdConsent: boolean;
  filename?: string;
  userComment?: string;
  timestamp?: string;
}

export interface FeedbackUpdate {
  userFeedback?: FeedbackValue;
  userComment?: string;
}

export type FeedbackUpdateResult =
  | { status: 'updated'; record: PredictionRecord }
  | { status: 'not_found' }
  | { status: 'consent_denied' };

/**
 * Opaque model output. Probabilities are fractions in [0, 1].
 */
export interface ModelPrediction {
  prediction: 'Cat' | 'Dog';
  confidence: number;
  probabilities: Record<PetClass, number>;
}

export interface PredictionResponse {
  filename?: string;
  prediction: 'Cat' | 'Dog';
  confidence: string;
  probabilities: Record<PetClass, string>;
  inference_time_ms: number;
  feedback_id: number;
}

export interface PredictionStatistics {
  total_predictions: number;
  successful_predictions: number;
  failed_predictions: number;
  avg_inference_time_ms: number;
  success_rate_pct: number;
  feedback_count: number;
  satisfaction_rate_pct: number;
  predictions_by_class: Record<PetClass, number>;
}

export interface RecentPredictionItem {
  id: number;
  timestamp: string;
  prediction_result: PredictionResult;
  proba_cat: number;
  proba_dog: number;
  inference_time_ms: number;
  success: boolean;
  rgpd_consent: boolean;
  user_feedback: FeedbackValue | null;
  filename: string | null;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  model_loaded: boolean;
  database: string;
  monitoring: {
    prometheus: boolean;
    discord: boolean;
  };
}
