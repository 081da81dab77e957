/**
 * Directory Scan
 *
 * Lists page images in a directory and enqueues one extract_facesheet
 * job per image.
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import {
  logger,
  type ExtractFacesheetJob,
  type ScanResponse,
} from '@facesheet/shared';
import type { PageQueue } from './page-queue';

export interface ScanOptions {
  directory: string;
  extensions: string[];
  maxPages: number;
}

/**
 * Image files in `directory` with one of `extensions` (case-insensitive),
 * sorted by file name for stable ordering.
 */
export function listPageImages(directory: string, extensions: readonly string[]): string[] {
  const wanted = extensions.map(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());

  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter(entry => entry.isFile() && wanted.includes(path.extname(entry.name).toLowerCase()))
    .map(entry => entry.name)
    .sort();
}

/**
 * Stable page id from an image file name, safe for use in a job id
 */
export function pageIdFromFilename(filename: string): string {
  return path.parse(filename).name.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Job id for a page image. The hash of the resolved path keeps images that
 * share a base name (other extension or directory) on separate jobs.
 */
export function jobIdForImage(imagePath: string): string {
  const hash = crypto.createHash('sha256').update(path.resolve(imagePath)).digest('hex');
  return `page_${pageIdFromFilename(imagePath)}_${hash.slice(0, 16)}`;
}

/**
 * Resolve a requested scan directory against the image root. Returns null
 * when the result lies outside the root.
 */
export function resolveScanDirectory(root: string, requested?: string): string | null {
  const resolvedRoot = path.resolve(root);
  const resolved = requested === undefined ? resolvedRoot : path.resolve(resolvedRoot, requested);
  const relative = path.relative(resolvedRoot, resolved);

  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

export async function scanDirectory(
  options: ScanOptions,
  correlationId: string,
  queue: PageQueue
): Promise<ScanResponse> {
  const images = listPageImages(options.directory, options.extensions).slice(0, options.maxPages);

  logger.info('Found page images', {
    directory: options.directory,
    count: images.length,
  });

  const enqueued: ScanResponse['enqueued'] = [];

  for (const filename of images) {
    const pageId = pageIdFromFilename(filename);
    const imagePath = path.resolve(options.directory, filename);

    const payload: ExtractFacesheetJob = {
      event_type: 'page.available',
      correlation_id: correlationId,
      page_id: pageId,
      image_path: imagePath,
      enqueued_at: new Date().toISOString(),
    };

    const jobId = jobIdForImage(imagePath);
    const job = await queue.add('extract_facesheet', payload, { jobId });

    enqueued.push({ page_id: pageId, image_path: imagePath, job_id: job.id ?? jobId });

    logger.debug('Enqueued extract_facesheet job', { page_id: pageId, job_id: jobId });
  }

  return { correlation_id: correlationId, enqueued };
}
