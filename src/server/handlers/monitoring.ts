/**
 * Read-only monitoring endpoints: statistics, recent predictions, health,
 * API info and the Prometheus scrape target.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { StoreFailureError } from '../errors.js';
import type { InferenceOrchestrator } from '../services/inference.js';
import type { MetricsExporter } from '../services/metrics.js';
import type { Predictor } from '../services/predictor.js';
import type { StatisticsService } from '../services/statistics.js';

export const API_VERSION = '1.0.0';

export function createStatisticsHandler(statistics: StatisticsService): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json(statistics.getStatistics());
    } catch (error) {
      next(new StoreFailureError('Could not compute statistics', error));
    }
  };
}

export function createRecentPredictionsHandler(statistics: StatisticsService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const raw = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : undefined;
      res.json(statistics.getRecentPredictions(raw));
    } catch (error) {
      next(new StoreFailureError('Could not load recent predictions', error));
    }
  };
}

export function createHealthHandler(orchestrator: InferenceOrchestrator): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json(orchestrator.checkHealth());
  };
}

export function createInfoHandler(
  predictor: Predictor,
  monitoring: { prometheus: boolean; discord: boolean }
): RequestHandler {
  return (_req: Request, res: Response): void => {
    const model = predictor.describe();
    const features = [
      'Image classification (cats/dogs)',
      'RGPD compliance',
      'User feedback collection',
      'SQLite prediction log',
    ];
    if (monitoring.prometheus) features.push('Prometheus metrics');
    if (monitoring.discord) features.push('Discord alerting');

    res.json({
      version: API_VERSION,
      model_loaded: predictor.isLoaded(),
      model,
      features,
      monitoring: {
        prometheus_enabled: monitoring.prometheus,
        discord_enabled: monitoring.discord,
        metrics_endpoint: monitoring.prometheus ? '/metrics' : null,
      },
    });
  };
}

export function createMetricsHandler(exporter: MetricsExporter): RequestHandler {
  return async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = await exporter.render();
      res.setHeader('Content-Type', exporter.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  };
}
