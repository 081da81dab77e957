import type {
  CountableQueue,
  ExtractFacesheetJob,
  PageExtractionResult,
  PageJobState,
} from '@facesheet/shared';

export interface PageJobRecord {
  readonly id?: string;
  readonly returnvalue: PageExtractionResult | null;
  readonly failedReason?: string;
  getState(): Promise<PageJobState>;
}

/**
 * The part of the extract_facesheet BullMQ queue the API uses
 */
export interface PageQueue extends CountableQueue {
  add(
    name: string,
    data: ExtractFacesheetJob,
    opts?: { jobId?: string }
  ): Promise<{ id?: string }>;
  getJob(jobId: string): Promise<PageJobRecord | undefined>;
}
