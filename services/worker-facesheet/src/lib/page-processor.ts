/**
 * Page Processor
 *
 * OCR one page image, extract the configured fields, validate and
 * return the page result.
 */

import path from 'path';
import type { Job } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  validatePageResult,
  buildPageResult,
  QUEUE_NAMES,
  jobsProcessedCounter,
  jobDurationHistogram,
  pagesProcessedCounter,
  fieldOutcomesCounter,
  extractionDurationHistogram,
  type FacesheetExtractor,
  type ExtractFacesheetJob,
  type PageExtractionResult,
  type TokenSource,
} from '@facesheet/shared';

export interface PageProcessorDeps {
  tokenSource: TokenSource;
  extractor: FacesheetExtractor;
}

/**
 * The job fields the processor reads
 */
export type PageJob = Pick<Job<ExtractFacesheetJob, PageExtractionResult>, 'id' | 'data' | 'attemptsMade'>;

export function createPageProcessor(deps: PageProcessorDeps) {
  return async function processPage(job: PageJob): Promise<PageExtractionResult> {
    const { correlation_id, page_id, image_path } = job.data;

    return runWithContextAsync(
      { correlationId: correlation_id, pageId: page_id, imagePath: image_path },
      async () => {
        const startTime = Date.now();

        logger.info('Processing extract_facesheet', {
          jobId: job.id,
          page_id,
          image: path.basename(image_path),
          attempt: job.attemptsMade + 1,
        });

        try {
          const tokens = await deps.tokenSource.readTokens(image_path);
          const extractorResult = deps.extractor.extract(tokens);

          const result = buildPageResult(
            extractorResult,
            { page_id, image_path, token_count: tokens.length },
            correlation_id
          );

          const validation = validatePageResult(result);
          if (!validation.valid) {
            throw new Error(`Page result failed validation: ${(validation.errors ?? []).join('; ')}`);
          }

          for (const field of result.fields) {
            logger.info('Field extracted', {
              label: field.label,
              value: field.value,
              parsed: field.parsed,
            });
          }

          for (const outcome of extractorResult.outcomes) {
            fieldOutcomesCounter.inc({ label: outcome.field.label, status: outcome.status });
          }

          const duration = (Date.now() - startTime) / 1000;
          extractionDurationHistogram.observe(
            { source: deps.tokenSource.name },
            extractorResult.metadata.durationMs / 1000
          );
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_FACESHEET, status: 'success' });
          jobDurationHistogram.observe(
            { queue: QUEUE_NAMES.EXTRACT_FACESHEET, status: 'success' },
            duration
          );
          pagesProcessedCounter.inc({ source: deps.tokenSource.name, status: 'success' });

          return result;
        } catch (error) {
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_FACESHEET, status: 'failed' });
          pagesProcessedCounter.inc({ source: deps.tokenSource.name, status: 'error' });
          throw error;
        }
      }
    );
  };
}
