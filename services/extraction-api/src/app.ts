/**
 * Extraction API application
 *
 * GET  /health        - Liveness + queue depth
 * GET  /metrics       - Prometheus metrics
 * GET  /fields        - Configured field specs
 * POST /extract       - Extract fields from a submitted token stream
 * POST /scan          - Enqueue every page image in a directory
 * GET  /pages/:jobId  - Page job state and result
 */

import fs from 'fs';
import express, { Express, Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  extractionDurationHistogram,
  fieldOutcomesCounter,
  pagesProcessedCounter,
  checkBackpressure,
  validateExtractRequest,
  tokensFromOcrData,
  parseFieldConfig,
  toFieldConfigRow,
  buildPageResult,
  FacesheetExtractor,
  TokenDataError,
  FieldConfigError,
  QUEUE_NAMES,
  type AssociationOptions,
  type ErrorEnvelope,
  type FieldSpec,
  type PageStatusResponse,
  type ScanRequest,
  type Token,
} from '@facesheet/shared';
import { resolveScanDirectory, scanDirectory } from './lib/scan';
import type { PageQueue } from './lib/page-queue';

export interface AppDeps {
  fieldSpecs: readonly FieldSpec[];
  pageQueue: PageQueue;
  associationOptions?: AssociationOptions;
  imageDirectory?: string;
}

const DEFAULT_MAX_PAGES = 50;
const CUSTOM_FIELD_LABEL = 'custom';

function errorEnvelope(code: ErrorEnvelope['error']['code'], message: string): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      correlation_id: getCorrelationId(),
    },
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Check a POST /scan body, returning an error message when it is malformed
 */
function checkScanRequest(body: unknown): { request: ScanRequest } | { error: string } {
  if (body === undefined || body === null) return { request: {} };
  if (typeof body !== 'object' || Array.isArray(body)) return { error: 'body must be a JSON object' };

  const request: ScanRequest = {};

  if ('directory' in body && body.directory !== undefined) {
    if (typeof body.directory !== 'string' || body.directory === '') {
      return { error: 'directory must be a non-empty string' };
    }
    request.directory = body.directory;
  }

  if ('extensions' in body && body.extensions !== undefined) {
    if (!isStringArray(body.extensions) || body.extensions.length === 0) {
      return { error: 'extensions must be a non-empty array of strings' };
    }
    request.extensions = body.extensions;
  }

  if ('max_pages' in body && body.max_pages !== undefined) {
    if (typeof body.max_pages !== 'number' || !Number.isInteger(body.max_pages) || body.max_pages < 1) {
      return { error: 'max_pages must be a positive integer' };
    }
    request.max_pages = body.max_pages;
  }

  return { request };
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const defaultExtractor = new FacesheetExtractor(deps.fieldSpecs, deps.associationOptions);

  // Middleware
  app.use(express.json({ limit: '5mb' }));

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
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

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
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const metrics = await checkBackpressure(deps.pageQueue);

      res.json({
        status: 'healthy',
        service: 'extraction-api',
        queue_depth: metrics.depth,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'extraction-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      await reportQueueMetrics([{ name: QUEUE_NAMES.EXTRACT_FACESHEET, queue: deps.pageQueue }]);
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Metrics collection failed', error);
      res.status(500).json(errorEnvelope('internal_error', 'Metrics collection failed'));
    }
  });

  app.get('/fields', (_req: Request, res: Response) => {
    res.json({ fields: deps.fieldSpecs.map(toFieldConfigRow) });
  });

  /**
   * POST /extract
   * Runs extraction synchronously on a submitted token stream
   */
  app.post('/extract', (req: Request, res: Response) => {
    const validation = validateExtractRequest(req.body);

    if (!validation.valid) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', `Invalid request body: ${validation.errors.join('; ')}`));
      return;
    }

    const { request } = validation;

    if ((request.tokens === undefined) === (request.ocr_data === undefined)) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Exactly one of tokens or ocr_data is required'));
      return;
    }

    try {
      const tokens: Token[] = request.tokens ?? (request.ocr_data ? tokensFromOcrData(request.ocr_data) : []);
      const extractor = request.fields
        ? new FacesheetExtractor(parseFieldConfig(request.fields), deps.associationOptions)
        : defaultExtractor;

      const extractorResult = extractor.extract(tokens);
      const result = buildPageResult(
        extractorResult,
        { page_id: 'inline', image_path: '', token_count: tokens.length },
        getCorrelationId()
      );

      // Caller-supplied labels would each open a new series
      for (const outcome of extractorResult.outcomes) {
        const label = request.fields ? CUSTOM_FIELD_LABEL : outcome.field.label;
        fieldOutcomesCounter.inc({ label, status: outcome.status });
      }
      extractionDurationHistogram.observe({ source: 'inline' }, extractorResult.metadata.durationMs / 1000);
      pagesProcessedCounter.inc({ source: 'inline', status: 'success' });

      res.json(result);
    } catch (error) {
      if (error instanceof TokenDataError || error instanceof FieldConfigError) {
        res.status(400).json(errorEnvelope('invalid_request', error.message));
        return;
      }

      logger.error('Inline extraction failed', error);
      pagesProcessedCounter.inc({ source: 'inline', status: 'error' });
      res.status(500).json(
        errorEnvelope('internal_error', error instanceof Error ? error.message : 'Unknown error')
      );
    }
  });

  /**
   * POST /scan
   * Enqueues one page job for every image in a directory
   */
  app.post('/scan', async (req: Request, res: Response) => {
    const checked = checkScanRequest(req.body);

    if ('error' in checked) {
      res.status(400).json(errorEnvelope('invalid_request', checked.error));
      return;
    }

    const imageRoot = deps.imageDirectory ?? config.imageDirectory;
    const directory = resolveScanDirectory(imageRoot, checked.request.directory);

    if (directory === null) {
      res.status(400).json(errorEnvelope('invalid_request', 'directory must be inside the image directory'));
      return;
    }

    if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
      res.status(400).json(errorEnvelope('invalid_request', `Image directory not found: ${directory}`));
      return;
    }

    // Symlinks may point out of the image root
    if (resolveScanDirectory(fs.realpathSync(imageRoot), fs.realpathSync(directory)) === null) {
      res.status(400).json(errorEnvelope('invalid_request', 'directory must be inside the image directory'));
      return;
    }

    try {
      const backpressure = await checkBackpressure(deps.pageQueue);

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', {
          queue_depth: backpressure.depth,
        });
        res
          .status(503)
          .json(errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.'));
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', {
          queue_depth: backpressure.depth,
        });
      }

      const response = await scanDirectory(
        {
          directory,
          extensions: checked.request.extensions ?? ['.jpg'],
          maxPages: checked.request.max_pages ?? DEFAULT_MAX_PAGES,
        },
        getCorrelationId(),
        deps.pageQueue
      );

      logger.info('Scan enqueued pages', {
        directory,
        enqueued: response.enqueued.length,
      });

      res.status(202).json(response);
    } catch (error) {
      logger.error('Scan failed', error);
      res.status(500).json(
        errorEnvelope('internal_error', error instanceof Error ? error.message : 'Unknown error')
      );
    }
  });

  /**
   * GET /pages/:jobId
   * State of a page job, with its result once completed
   */
  app.get('/pages/:jobId', async (req: Request, res: Response) => {
    try {
      const job = await deps.pageQueue.getJob(req.params.jobId);

      if (!job) {
        res.status(404).json(errorEnvelope('not_found', `Page job not found: ${req.params.jobId}`));
        return;
      }

      const state = await job.getState();
      const body: PageStatusResponse = { job_id: req.params.jobId, state };

      if (state === 'completed' && job.returnvalue) {
        body.result = job.returnvalue;
      }
      if (state === 'failed' && job.failedReason) {
        body.failed_reason = job.failedReason;
      }

      res.json(body);
    } catch (error) {
      logger.error('Page status lookup failed', error);
      res.status(500).json(
        errorEnvelope('internal_error', error instanceof Error ? error.message : 'Unknown error')
      );
    }
  });

  return app;
}
