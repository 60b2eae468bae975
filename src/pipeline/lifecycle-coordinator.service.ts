import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { parseAllowedFormats } from '../config/pipeline.config';
import { AdmissionError, describeError } from '../errors/pipeline.errors';
import { AssetCheckOptions, checkAsset, gigabytesToBytes } from './asset-checks';
import { ConcurrencyLedgerService } from './concurrency-ledger.service';
import { estimateProcessingMinutes, formatVideoReport } from './estimation';
import {
  DELIVERY_GATEWAY,
  DeliveryGateway,
  PLAN_POLICY,
  PROCESSING_GATEWAY,
  PlanPolicy,
  ProcessingGateway,
} from './interfaces/gateways.interface';
import {
  CancelOutcome,
  PipelineStats,
  QueueEntry,
  ReconcileSummary,
  RejectionReason,
  RelocatedAsset,
  SubmitOutcome,
  TrackedJob,
  Variant,
  VideoAsset,
} from './interfaces/job.interface';
import {
  Owner,
  describeOwner,
  ownerKey,
  slotId,
} from './interfaces/owner.interface';
import { JobRegistryService } from './job-registry.service';
import * as messages from './messages';
import { QueueStoreService } from './queue-store.service';

interface SlotCount {
  kind: 'user' | 'channel';
  id: number;
  count: number;
}

interface DrainRequest {
  owner: Owner;
  settle: () => void;
}

/**
 * Ties submission, admission, queueing, completion, timeout and cleanup
 * together. The only writer of the ledger, the queue store and the registry.
 *
 * Every mutation of those three happens in a synchronous stretch of code; the
 * awaits in between are the platform I/O calls, and anything that may have
 * changed across one of them is looked up again afterwards.
 */
@Injectable()
export class LifecycleCoordinatorService implements OnApplicationShutdown {
  private readonly logger = new Logger(LifecycleCoordinatorService.name);

  // ownerKey -> a representative owner, for owners with work in flight or queued
  private readonly activeOwners: Map<string, Owner> = new Map();

  // ownerKey -> slots taken by admissions still relocating or parking
  private readonly admitting: Map<string, { owner: Owner; count: number }> = new Map();

  // Owners whose next queued submission should be retried, in request order
  private readonly drainRequests: DrainRequest[] = [];
  private draining = false;
  private drainLoop: Promise<void> = Promise.resolve();

  private closing = false;

  private readonly totals = {
    accepted: 0,
    queued: 0,
    rejected: 0,
    completed: 0,
    timedOut: 0,
    cancelled: 0,
  };

  private readonly queueSizeLimit: number;
  private readonly maxInFlight: number;
  private readonly timeoutMs: number;
  private readonly maxVideoSizeGb: number;
  private readonly processingTimeFactor: number;
  private readonly assetChecks: AssetCheckOptions;
  private readonly limits: { regular: number; premium: number; channel: number };

  constructor(
    private readonly configService: ConfigService,
    private readonly ledger: ConcurrencyLedgerService,
    private readonly queue: QueueStoreService,
    private readonly registry: JobRegistryService,
    @Inject(PROCESSING_GATEWAY) private readonly processing: ProcessingGateway,
    @Inject(DELIVERY_GATEWAY) private readonly delivery: DeliveryGateway,
    @Inject(PLAN_POLICY) private readonly planPolicy: PlanPolicy,
  ) {
    this.queueSizeLimit = this.configService.get<number>('QUEUE_SIZE_LIMIT', 1000);
    this.maxInFlight = this.configService.get<number>('MAX_QUEUED_VIDEOS', 100);
    this.timeoutMs = this.configService.get<number>('VIDEO_TIMEOUT_SECONDS', 3600) * 1000;
    this.maxVideoSizeGb = this.configService.get<number>('MAX_VIDEO_SIZE_GB', 1.5);
    this.processingTimeFactor = this.configService.get<number>('PROCESSING_TIME_FACTOR', 0.033);
    this.assetChecks = {
      maxSizeBytes: gigabytesToBytes(this.maxVideoSizeGb),
      allowedFormats: parseAllowedFormats(
        this.configService.get<string>('ALLOWED_FORMATS', 'h264:mkv,h264:mp4,hevc:mkv,hevc:mp4,h265:mkv,h265:mp4'),
      ),
    };
    this.limits = {
      regular: this.configService.get<number>('MAX_CONCURRENT_VIDEOS_REGULAR', 1),
      premium: this.configService.get<number>('MAX_CONCURRENT_VIDEOS_PREMIUM', 5),
      channel: this.configService.get<number>('MAX_CONCURRENT_VIDEOS_CHANNEL', 5),
    };
  }

  /**
   * Admit a video immediately, queue it behind the owner's earlier
   * submissions, or refuse it. Never throws.
   */
  async submit(owner: Owner, asset: VideoAsset): Promise<SubmitOutcome> {
    const entry: QueueEntry = {
      submissionId: uuidv4(),
      owner,
      asset,
      enqueuedAt: new Date(),
    };

    this.logger.log(
      `Submission ${entry.submissionId} from ${describeOwner(owner)} ` +
      `(${asset.fileSize} bytes, ${asset.duration}s)`,
    );

    try {
      return await this.admit(entry, false);
    } catch (error) {
      // admit() converts every I/O failure itself; this only guards programming errors
      this.logger.error(`Unexpected failure admitting ${entry.submissionId}: ${describeError(error)}`);
      return this.reject(entry, 'relocation-failed');
    }
  }

  /**
   * Cancel the owner's in-flight job, or failing that one of its queued
   * submissions. Counters are untouched when there is nothing to cancel.
   */
  async cancel(owner: Owner): Promise<CancelOutcome> {
    const jobId = this.registry.lookupByOwner(owner);

    if (jobId) {
      const ended = await this.cleanup(jobId);
      if (ended) {
        this.totals.cancelled++;
        this.logger.log(`Job ${jobId} cancelled by ${describeOwner(owner)}`);
        return { status: 'cancelled', jobId };
      }
      // Completed or expired while we were looking
      return { status: 'nothing-to-cancel' };
    }

    const discarded = this.queue.discard(owner, (entry) =>
      owner.kind === 'channel-post'
        ? entry.owner.kind === 'channel-post' && entry.owner.messageId === owner.messageId
        : true,
    );

    if (discarded) {
      this.totals.cancelled++;
      this.pruneOwner(owner);
      this.logger.log(`Queued submission ${discarded.submissionId} cancelled by ${describeOwner(owner)}`);
      return { status: 'cancelled', submissionId: discarded.submissionId };
    }

    this.logger.log(`Nothing to cancel for ${describeOwner(owner)}`);
    return { status: 'nothing-to-cancel' };
  }

  /**
   * End a job's life. Safe to call any number of times for the same job: only
   * the caller whose registry removal succeeds releases the slot.
   *
   * @returns whether this call ended the job
   */
  async cleanup(jobId: string): Promise<boolean> {
    const job = this.registry.remove(jobId);
    if (!job) {
      this.logger.debug(`Cleanup of job ${jobId} skipped: no longer tracked`);
      return false;
    }

    await this.release(job);
    return true;
  }

  /**
   * Deliver the variants of a finished job. A job that is already gone has
   * been dealt with by someone else and gets no effects at all.
   */
  async completionHandler(jobId: string, variants: Variant[]): Promise<boolean> {
    const job = this.registry.remove(jobId);
    if (!job) {
      this.logger.warn(`Completion of job ${jobId} ignored: no longer tracked`);
      return false;
    }

    let qualitiesSent = 0;
    let delivered = false;

    try {
      if (job.owner.kind === 'user') {
        qualitiesSent = await this.delivery.deliverResult(job.owner.userId, variants);
      } else {
        await this.delivery.replaceInPlace(job.owner.channelId, job.owner.messageId, variants);
      }
      delivered = true;
      this.logger.log(`Job ${jobId} delivered to ${describeOwner(job.owner)} (${variants.length} variants)`);
    } catch (error) {
      this.logger.error(`Delivery of job ${jobId} to ${describeOwner(job.owner)} failed: ${describeError(error)}`);
    } finally {
      this.totals.completed++;
      await this.reportCompletion(job, qualitiesSent, delivered);
      await this.release(job);
    }

    return true;
  }

  /**
   * Timeout path, driven by the poller.
   */
  async expire(jobId: string): Promise<boolean> {
    const job = this.registry.remove(jobId);
    if (!job) {
      this.logger.debug(`Timeout of job ${jobId} skipped: no longer tracked`);
      return false;
    }

    const minutes = (Date.now() - job.submittedAt.getTime()) / 60_000;
    this.logger.warn(`Job ${jobId} for ${describeOwner(job.owner)} timed out after ${minutes.toFixed(1)} minutes`);

    try {
      this.totals.timedOut++;
      if (job.owner.kind === 'user') {
        await this.notify(job.owner, messages.PROCESSING_TIMEOUT(minutes));
      }
      await this.report(
        `Processing timeout: ${describeOwner(job.owner)} (job ${jobId}) after ${minutes.toFixed(1)} minutes`,
      );
    } finally {
      await this.release(job);
    }

    return true;
  }

  hasTimedOut(job: TrackedJob, now: number = Date.now()): boolean {
    return now - job.submittedAt.getTime() > this.timeoutMs;
  }

  /**
   * Realign ledger counters with the registry, forget owners with nothing
   * left, and retry queues that have a free slot but nobody draining them.
   */
  async reconcile(): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { correctedCounters: 0, prunedOwners: 0, drainsRequested: 0 };

    // A slot is accounted for by a tracked job or by an admission in progress
    const expected = new Map<string, SlotCount>();
    const account = (owner: Owner, count: number): void => {
      const key = ownerKey(owner);
      const slot: SlotCount = expected.get(key) ?? {
        kind: owner.kind === 'user' ? 'user' : 'channel',
        id: slotId(owner),
        count: 0,
      };
      slot.count += count;
      expected.set(key, slot);
    };
    for (const job of this.registry.snapshot()) {
      account(job.owner, 1);
    }
    for (const { owner, count } of this.admitting.values()) {
      account(owner, count);
    }

    const actual = new Map<string, SlotCount>();
    for (const entry of this.ledger.entries()) {
      actual.set(`${entry.kind}:${entry.id}`, entry);
    }

    for (const key of new Set([...expected.keys(), ...actual.keys()])) {
      const want = expected.get(key);
      const have = actual.get(key);
      const wantCount = want?.count ?? 0;
      const haveCount = have?.count ?? 0;
      const slot = want ?? have;
      if (slot && wantCount !== haveCount) {
        this.logger.warn(`Ledger drift for ${key}: counted ${haveCount}, registry holds ${wantCount}`);
        this.ledger.resetSlot(slot.kind, slot.id, wantCount);
        summary.correctedCounters++;
      }
    }

    for (const owner of Array.from(this.activeOwners.values())) {
      if (this.pruneOwner(owner)) {
        summary.prunedOwners++;
      }
    }

    for (const owner of this.queue.owners()) {
      const limit = await this.limitFor(owner);
      if (this.ledger.count(owner) < limit) {
        this.scheduleDrain(owner);
        summary.drainsRequested++;
      }
    }

    return summary;
  }

  getStatistics(): PipelineStats {
    return {
      inFlight: this.registry.size,
      pending: this.queue.total(),
      activeOwners: this.activeOwners.size,
      limits: {
        ...this.limits,
        queueSizeLimit: this.queueSizeLimit,
        maxInFlight: this.maxInFlight,
      },
      totals: { ...this.totals },
    };
  }

  /** Resolves once every drain requested so far has been handled. */
  whenIdle(): Promise<void> {
    return this.drainLoop;
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.closing = true;
    this.logger.log(`Shutting down${signal ? ` on ${signal}` : ''}: releasing ${this.registry.size} in-flight jobs`);

    const dropped = this.queue.clear();
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} queued submissions`);
    }

    for (const job of this.registry.snapshot()) {
      await this.cleanup(job.jobId);
    }

    await this.drainLoop;
    // Admissions still relocating or parking give their own slots back
    if (this.admitting.size === 0) {
      this.ledger.clear();
    }
    this.activeOwners.clear();
    this.logger.log('Shutdown cleanup of parked videos completed');
  }

  private async admit(entry: QueueEntry, fromQueue: boolean): Promise<SubmitOutcome> {
    const { owner, asset } = entry;

    if (this.closing) {
      return this.reject(entry, 'shutting-down');
    }

    const limit = await this.limitFor(owner);

    // From here to the ledger increment nothing awaits
    if (this.closing) {
      return this.reject(entry, 'shutting-down');
    }

    try {
      this.assertCapacity();
    } catch (error) {
      if (!(error instanceof AdmissionError)) {
        throw error;
      }
      this.logger.warn(`${error.message}: refusing ${entry.submissionId}`);
      await this.notify(owner, messages.SYSTEM_BUSY);
      return this.reject(entry, error.reason);
    }

    const problem = checkAsset(asset, this.assetChecks);
    if (problem) {
      this.logger.log(`Submission ${entry.submissionId} refused: ${problem}`);
      await this.notify(
        owner,
        problem === 'too-large' ? messages.VIDEO_TOO_LARGE(this.maxVideoSizeGb) : messages.UNSUPPORTED_FORMAT,
      );
      return this.reject(entry, problem);
    }

    if (!fromQueue && this.queue.hasPending(owner)) {
      // Earlier submissions go first even when a slot is free right now
      const position = this.queue.enqueue(owner, entry);
      this.markActive(owner);
      this.scheduleDrain(owner);
      return this.queued(entry, position);
    }

    const active = this.ledger.count(owner);
    if (active >= limit) {
      this.markActive(owner);
      if (fromQueue) {
        // Still no room: back to the head so the owner's order is kept
        this.queue.requeueFront(owner, entry);
        this.logger.log(`Queued submission ${entry.submissionId} still over the limit of ${limit}; requeued`);
        return { status: 'queued', submissionId: entry.submissionId, position: 1 };
      }
      const position = this.queue.enqueue(owner, entry);
      this.logger.log(
        `${describeOwner(owner)} has ${active} active videos (max: ${limit}); ` +
        `submission ${entry.submissionId} queued at position ${position}`,
      );
      return this.queued(entry, position);
    }

    this.ledger.increment(owner);
    this.markActive(owner);
    this.beginAdmission(owner);

    let relocated: RelocatedAsset;
    try {
      relocated = await this.processing.relocate(asset);
    } catch (error) {
      this.logger.error(`Relocation of ${entry.submissionId} failed: ${describeError(error)}`);
      this.rollback(owner);
      await this.notify(owner, messages.COULD_NOT_START);
      return this.reject(entry, 'relocation-failed');
    }

    if (relocated.variants.length > 0) {
      return this.finishInstantly(entry, relocated);
    }

    let parkedHandle: string;
    try {
      parkedHandle = await this.processing.parkForProcessing(relocated.stagingId);
    } catch (error) {
      this.logger.error(
        `Parking of ${entry.submissionId} (staged as ${relocated.stagingId}) failed: ${describeError(error)}`,
      );
      this.rollback(owner);
      await this.notify(owner, messages.COULD_NOT_START);
      await this.report(`Staged video ${relocated.stagingId} orphaned: parking failed for ${describeOwner(owner)}`);
      return this.reject(entry, 'scheduling-failed');
    }

    if (this.closing) {
      await this.cancelParked(parkedHandle);
      this.rollback(owner);
      return this.reject(entry, 'shutting-down');
    }

    try {
      this.registry.track(relocated.stagingId, owner, parkedHandle, asset.fileSize, asset.duration, {
        submissionId: entry.submissionId,
        height: asset.height,
      });
      this.endAdmission(owner);
    } catch (error) {
      this.logger.error(`Tracking of ${entry.submissionId} failed: ${describeError(error)}`);
      await this.cancelParked(parkedHandle);
      this.rollback(owner);
      await this.notify(owner, messages.COULD_NOT_START);
      return this.reject(entry, 'scheduling-failed');
    }

    const estimatedMinutes = estimateProcessingMinutes(asset.duration, asset.height, this.processingTimeFactor);
    this.totals.accepted++;
    this.logger.log(
      `Job ${relocated.stagingId} started for ${describeOwner(owner)} ` +
      `(submission ${entry.submissionId}, parked as ${parkedHandle})`,
    );
    await this.notify(owner, messages.PROCESSING_STARTED(estimatedMinutes));

    return {
      status: 'accepted',
      submissionId: entry.submissionId,
      jobId: relocated.stagingId,
      instant: false,
      estimatedMinutes,
    };
  }

  /**
   * The staged copy already carried its variants: hand them over and give the
   * slot back without ever tracking the job.
   */
  private async finishInstantly(entry: QueueEntry, relocated: RelocatedAsset): Promise<SubmitOutcome> {
    const { owner, asset } = entry;
    this.logger.log(`Video ${relocated.stagingId} for ${describeOwner(owner)} was processed on arrival`);

    let qualitiesSent = 0;
    try {
      if (owner.kind === 'user') {
        qualitiesSent = await this.delivery.deliverResult(owner.userId, relocated.variants);
      }
      await this.report(
        `Video processed on arrival\n${describeOwner(owner)}\n` +
        formatVideoReport({
          originalSize: asset.fileSize,
          duration: asset.duration,
          processingMinutes: 0,
          estimatedMinutes: 0,
          qualitiesSent,
        }),
      );
    } catch (error) {
      this.logger.error(`Delivery of instantly processed ${relocated.stagingId} failed: ${describeError(error)}`);
    } finally {
      this.endAdmission(owner);
      this.ledger.decrement(owner);
      this.pruneOwner(owner);
      this.scheduleDrain(owner);
    }

    this.totals.accepted++;
    return {
      status: 'accepted',
      submissionId: entry.submissionId,
      jobId: relocated.stagingId,
      instant: true,
      estimatedMinutes: 0,
    };
  }

  /**
   * Everything after the registry removal. Each step runs even when the one
   * before it failed.
   */
  private async release(job: TrackedJob): Promise<void> {
    await this.cancelParked(job.parkedHandle);

    try {
      const remaining = this.ledger.decrement(job.owner);
      this.logger.log(`Released slot of ${describeOwner(job.owner)}; ${remaining} still active`);
    } catch (error) {
      this.logger.error(`Ledger release for job ${job.jobId} failed: ${describeError(error)}`);
    }

    try {
      this.pruneOwner(job.owner);
    } catch (error) {
      this.logger.error(`Active owner pruning for job ${job.jobId} failed: ${describeError(error)}`);
    }

    await this.requestDrain(job.owner);
  }

  private rollback(owner: Owner): void {
    this.endAdmission(owner);
    this.ledger.decrement(owner);
    this.pruneOwner(owner);
  }

  /**
   * Both global caps count taken slots, so admissions still relocating or
   * parking are included.
   *
   * @throws AdmissionError
   */
  private assertCapacity(): void {
    const inFlight = this.ledger.total();
    const pending = this.queue.total();

    if (inFlight + pending >= this.queueSizeLimit) {
      throw new AdmissionError(`Queue full (${inFlight} in flight, ${pending} pending)`, 'queue-full');
    }
    if (inFlight >= this.maxInFlight) {
      throw new AdmissionError(`Processing capacity reached (${inFlight} in flight)`, 'system-busy');
    }
  }

  private beginAdmission(owner: Owner): void {
    const key = ownerKey(owner);
    const current = this.admitting.get(key);
    this.admitting.set(key, { owner, count: (current?.count ?? 0) + 1 });
  }

  private endAdmission(owner: Owner): void {
    const key = ownerKey(owner);
    const current = this.admitting.get(key);
    if (!current) {
      return;
    }
    if (current.count <= 1) {
      this.admitting.delete(key);
    } else {
      this.admitting.set(key, { owner: current.owner, count: current.count - 1 });
    }
  }

  private markActive(owner: Owner): void {
    this.activeOwners.set(ownerKey(owner), owner);
  }

  /**
   * @returns whether the owner was dropped from the active set
   */
  private pruneOwner(owner: Owner): boolean {
    const key = ownerKey(owner);
    if (!this.activeOwners.has(key)) {
      return false;
    }
    if (this.registry.countFor(owner) > 0 || this.queue.hasPending(owner) || this.admitting.has(key)) {
      return false;
    }
    this.activeOwners.delete(key);
    this.logger.debug(`Owner ${key} has no active or queued videos left`);
    return true;
  }

  /**
   * Resolves once this request has been handled. Requests made earlier, for
   * any owner, are handled first; later ones are not waited for.
   */
  private requestDrain(owner: Owner): Promise<void> {
    return new Promise<void>((resolve) => this.enqueueDrain(owner, resolve));
  }

  private scheduleDrain(owner: Owner): void {
    this.enqueueDrain(owner, () => undefined);
  }

  /**
   * A single loop works through requests one at a time, so resubmissions
   * never run concurrently with each other.
   */
  private enqueueDrain(owner: Owner, settle: () => void): void {
    if (this.closing) {
      settle();
      return;
    }
    this.drainRequests.push({ owner, settle });
    if (!this.draining) {
      this.draining = true;
      this.drainLoop = this.runDrainLoop();
    }
  }

  private async runDrainLoop(): Promise<void> {
    let request = this.drainRequests.shift();
    while (request) {
      try {
        await this.drainOnce(request.owner);
      } finally {
        request.settle();
      }
      request = this.drainRequests.shift();
    }
    this.draining = false;
  }

  private async drainOnce(owner: Owner): Promise<void> {
    const entry = this.queue.dequeueNext(owner);
    if (!entry) {
      this.logger.debug(`No queued videos for ${ownerKey(owner)}`);
      return;
    }

    this.logger.log(`Processing next queued video ${entry.submissionId} for ${describeOwner(entry.owner)}`);

    try {
      const outcome = await this.admit(entry, true);
      if (outcome.status === 'rejected') {
        this.logger.warn(`Queued submission ${entry.submissionId} dropped: ${outcome.reason}`);
        this.pruneOwner(entry.owner);
      } else if (outcome.status === 'accepted' && this.queue.hasPending(entry.owner)) {
        // The owner may have more than one free slot
        this.drainRequests.push({ owner: entry.owner, settle: () => undefined });
      }
    } catch (error) {
      this.logger.error(`Error processing next queued video for ${ownerKey(owner)}: ${describeError(error)}`);
    }
  }

  private async limitFor(owner: Owner): Promise<number> {
    try {
      return await this.planPolicy.limitFor(owner);
    } catch (error) {
      const fallback = owner.kind === 'user' ? this.limits.regular : this.limits.channel;
      this.logger.warn(`Plan lookup for ${describeOwner(owner)} failed, using ${fallback}: ${describeError(error)}`);
      return fallback;
    }
  }

  private async cancelParked(parkedHandle: string): Promise<void> {
    try {
      await this.processing.cancelParked(parkedHandle);
    } catch (error) {
      this.logger.warn(`Could not cancel parked video ${parkedHandle}: ${describeError(error)}`);
    }
  }

  private async notify(owner: Owner, text: string): Promise<void> {
    if (owner.kind !== 'user') {
      this.logger.debug(`Notice for ${describeOwner(owner)} not sent: ${text}`);
      return;
    }
    try {
      await this.delivery.notify(owner.userId, text);
    } catch (error) {
      this.logger.warn(`Could not notify user ${owner.userId}: ${describeError(error)}`);
    }
  }

  private async report(text: string): Promise<void> {
    try {
      await this.delivery.reportToOperator(text);
    } catch (error) {
      this.logger.warn(`Could not send operator report: ${describeError(error)}`);
    }
  }

  private async reportCompletion(job: TrackedJob, qualitiesSent: number, delivered: boolean): Promise<void> {
    const processingMinutes = (Date.now() - job.submittedAt.getTime()) / 60_000;
    const status = formatVideoReport({
      originalSize: job.originalSize,
      duration: job.duration,
      processingMinutes,
      estimatedMinutes: estimateProcessingMinutes(job.duration, job.height, this.processingTimeFactor),
      qualitiesSent,
    });
    const outcome = job.owner.kind === 'channel-post'
      ? ` (edit ${delivered ? 'succeeded' : 'failed'})`
      : '';
    await this.report(`${describeOwner(job.owner)}\n\n${status}${outcome}`);
  }

  private async queued(entry: QueueEntry, position: number): Promise<SubmitOutcome> {
    this.totals.queued++;
    await this.notify(entry.owner, messages.QUEUED(position));
    return { status: 'queued', submissionId: entry.submissionId, position };
  }

  private reject(entry: QueueEntry, reason: RejectionReason): SubmitOutcome {
    this.totals.rejected++;
    return { status: 'rejected', submissionId: entry.submissionId, reason };
  }
}
