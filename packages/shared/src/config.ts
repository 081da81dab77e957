/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import type { SelfExclusionMode } from './types';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Inputs
  imageDirectory: string;
  fieldConfigPath: string;

  // OCR
  tesseractPath: string;
  tesseractLanguage: string;
  ocrTimeoutMs: number;

  // Value association
  minCandidateConfidence: number;
  verticalTolerance: number;
  selfExclusion: SelfExclusionMode;

  // Ports
  apiPort: number;
  metricsPort: number;
}

function parseSelfExclusion(value: string | undefined): SelfExclusionMode {
  return value === 'text' ? 'text' : 'identity';
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '5', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '5000', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '10000', 10),

  // Inputs
  imageDirectory: process.env.IMAGE_DIRECTORY || 'bin/facesheets',
  fieldConfigPath: process.env.FIELD_CONFIG_PATH || 'config/fields.json',

  // OCR
  tesseractPath: process.env.TESSERACT_PATH || 'tesseract',
  tesseractLanguage: process.env.TESSERACT_LANG || 'eng',
  ocrTimeoutMs: parseInt(process.env.OCR_TIMEOUT_MS || '60000', 10),

  // Value association
  minCandidateConfidence: parseFloat(process.env.MIN_CANDIDATE_CONFIDENCE || '10'),
  verticalTolerance: parseFloat(process.env.VERTICAL_TOLERANCE || '10'),
  selfExclusion: parseSelfExclusion(process.env.FACESHEET_SELF_EXCLUSION),

  // Ports
  apiPort: parseInt(process.env.PORT || '8080', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9091', 10),
};
