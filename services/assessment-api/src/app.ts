/**
 * Assessment API
 *
 * Thin HTTP transport over the assessment pipeline. Stateless: every
 * request is one pipeline run.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  validateAssessmentRequest,
  type AssessmentPipeline,
} from '@riskline/shared';
import { invalidRequest, toErrorResponse } from './lib/errors';

export function createApp(pipeline: AssessmentPipeline, serviceName = 'assessment-api'): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '1mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /assessments
   * Body: { applicant, property, loan }. Responds with the pipeline result.
   */
  app.post('/assessments', async (req: Request, res: Response) => {
    const correlationId = getCorrelationId();

    const validation = validateAssessmentRequest(req.body);
    if (!validation.valid) {
      const { status, body } = invalidRequest(validation.errors, correlationId);
      res.status(status).json(body);
      return;
    }

    try {
      const { applicant, property, loan } = validation.value;
      const result = await pipeline.run(applicant, property, loan);
      res.json(result);
    } catch (error) {
      const { status, body } = toErrorResponse(error, correlationId);
      res.status(status).json(body);
    }
  });

  return app;
}
