/**
 * Facesheet Worker
 *
 * Consumes extract_facesheet jobs: OCR the page image, extract the
 * configured fields, and return the page result as the job result.
 */

import {
  logger,
  config,
  createWorker,
  serveMetrics,
  loadFieldConfig,
  FacesheetExtractor,
  QUEUE_NAMES,
  type ExtractFacesheetJob,
  type PageExtractionResult,
} from '@facesheet/shared';
import { TesseractTokenSource } from './lib/tesseract';
import { createPageProcessor } from './lib/page-processor';

// Configuration errors are fatal at startup
const fieldSpecs = loadFieldConfig(config.fieldConfigPath);

const processPage = createPageProcessor({
  tokenSource: new TesseractTokenSource({
    tesseractPath: config.tesseractPath,
    language: config.tesseractLanguage,
    timeoutMs: config.ocrTimeoutMs,
  }),
  extractor: new FacesheetExtractor(fieldSpecs, {
    minConfidence: config.minCandidateConfidence,
    verticalTolerance: config.verticalTolerance,
    selfExclusion: config.selfExclusion,
  }),
});

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<ExtractFacesheetJob, PageExtractionResult>(
  QUEUE_NAMES.EXTRACT_FACESHEET,
  processPage
);

logger.info('Facesheet worker started', {
  field_count: fieldSpecs.length,
  tesseract_path: config.tesseractPath,
  self_exclusion: config.selfExclusion,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  try {
    await worker.close();
    metricsServer.close();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
