/**
 * Extraction API
 *
 * HTTP front door: inline extraction of submitted tokens, directory
 * scans that enqueue page jobs, and job status lookups.
 */

import {
  logger,
  config,
  createQueue,
  loadFieldConfig,
  QUEUE_NAMES,
  type ExtractFacesheetJob,
  type ExtractFacesheetQueue,
  type PageExtractionResult,
} from '@facesheet/shared';
import { createApp } from './app';

// Configuration errors are fatal at startup
const fieldSpecs = loadFieldConfig(config.fieldConfigPath);

const pageQueue: ExtractFacesheetQueue = createQueue<ExtractFacesheetJob, PageExtractionResult>(
  QUEUE_NAMES.EXTRACT_FACESHEET
);

const app = createApp({
  fieldSpecs,
  pageQueue,
  associationOptions: {
    minConfidence: config.minCandidateConfidence,
    verticalTolerance: config.verticalTolerance,
    selfExclusion: config.selfExclusion,
  },
  imageDirectory: config.imageDirectory,
});

// Start server
const server = app.listen(config.apiPort, () => {
  logger.info('Extraction API started', { port: config.apiPort });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  try {
    server.close();
    await pageQueue.close();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
