import { Injectable, Logger } from '@nestjs/common';
import { ConsistencyError } from '../errors/pipeline.errors';
import { TrackedJob } from './interfaces/job.interface';
import {
  Owner,
  channelPostKey,
  describeOwner,
  ownerKey,
} from './interfaces/owner.interface';

export interface TrackDetails {
  submissionId: string;
  height?: number;
  submittedAt?: Date;
}

/**
 * The authoritative table of in-flight jobs. A job id is present here exactly
 * while its job holds a slot; every reverse index is written and erased in the
 * same synchronous call as the primary entry.
 */
@Injectable()
export class JobRegistryService {
  private readonly logger = new Logger(JobRegistryService.name);
  private readonly jobs: Map<string, TrackedJob> = new Map();
  private readonly byHandle: Map<string, string> = new Map();
  // ownerKey -> job ids in admission order
  private readonly byOwner: Map<string, Set<string>> = new Map();
  private readonly byChannelPost: Map<string, string> = new Map();

  track(
    jobId: string,
    owner: Owner,
    parkedHandle: string,
    originalSize: number,
    duration: number,
    details: TrackDetails,
  ): TrackedJob {
    if (this.jobs.has(jobId)) {
      throw new ConsistencyError(`Job ${jobId} is already tracked`);
    }
    if (this.byHandle.has(parkedHandle)) {
      throw new ConsistencyError(
        `Parked handle ${parkedHandle} already belongs to job ${this.byHandle.get(parkedHandle)}`,
      );
    }

    const job: TrackedJob = {
      jobId,
      owner,
      parkedHandle,
      submittedAt: details.submittedAt ?? new Date(),
      originalSize,
      duration,
      height: details.height,
      submissionId: details.submissionId,
    };

    this.jobs.set(jobId, job);
    this.byHandle.set(parkedHandle, jobId);

    const key = ownerKey(owner);
    const owned = this.byOwner.get(key) ?? new Set<string>();
    owned.add(jobId);
    this.byOwner.set(key, owned);

    if (owner.kind === 'channel-post') {
      this.byChannelPost.set(channelPostKey(owner), jobId);
    }

    this.logger.debug(`Tracking job ${jobId} for ${describeOwner(owner)} (parked as ${parkedHandle})`);
    return job;
  }

  /**
   * Delete a job and all of its index entries.
   *
   * @returns the removed job, or `undefined` when another caller got there first
   */
  remove(jobId: string): TrackedJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      return undefined;
    }

    this.jobs.delete(jobId);

    if (this.byHandle.get(job.parkedHandle) === jobId) {
      this.byHandle.delete(job.parkedHandle);
    } else {
      this.logger.warn(`Handle index for job ${jobId} pointed elsewhere during removal`);
    }

    const key = ownerKey(job.owner);
    const owned = this.byOwner.get(key);
    owned?.delete(jobId);
    if (owned && owned.size === 0) {
      this.byOwner.delete(key);
    }

    if (job.owner.kind === 'channel-post') {
      const postKey = channelPostKey(job.owner);
      if (this.byChannelPost.get(postKey) === jobId) {
        this.byChannelPost.delete(postKey);
      }
    }

    return job;
  }

  /**
   * A user's oldest in-flight job, or the job of exactly that channel post.
   */
  lookupByOwner(owner: Owner): string | undefined {
    if (owner.kind === 'channel-post') {
      return this.byChannelPost.get(channelPostKey(owner));
    }
    const owned = this.byOwner.get(ownerKey(owner));
    if (!owned) {
      return undefined;
    }
    for (const jobId of owned) {
      return jobId;
    }
    return undefined;
  }

  get(jobId: string): TrackedJob | undefined {
    return this.jobs.get(jobId);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /** Jobs counted against the same slot holder (a user, or a whole channel). */
  countFor(owner: Owner): number {
    return this.byOwner.get(ownerKey(owner))?.size ?? 0;
  }

  get size(): number {
    return this.jobs.size;
  }

  snapshot(): TrackedJob[] {
    return Array.from(this.jobs.values(), (job) => ({ ...job }));
  }
}
