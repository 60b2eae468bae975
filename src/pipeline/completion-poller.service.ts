import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { describeError } from '../errors/pipeline.errors';
import { PROCESSING_GATEWAY, ProcessingGateway } from './interfaces/gateways.interface';
import { SweepSummary, TrackedJob, Variant } from './interfaces/job.interface';
import { JobRegistryService } from './job-registry.service';
import { LifecycleCoordinatorService } from './lifecycle-coordinator.service';

export const COMPLETION_POLLER_INTERVAL = 'completion-poller';

type JobCheck = 'timed-out' | 'completed' | 'stale' | 'pending' | 'probe-error';

/**
 * The platform never says when processing is done, so every tracked job is
 * looked at on a fixed interval until it completes or times out.
 */
@Injectable()
export class CompletionPollerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(CompletionPollerService.name);
  private readonly intervalMs: number;
  private sweeping = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly registry: JobRegistryService,
    private readonly coordinator: LifecycleCoordinatorService,
    @Inject(PROCESSING_GATEWAY) private readonly processing: ProcessingGateway,
  ) {
    this.intervalMs = this.configService.get<number>('CHECK_INTERVAL_SECONDS', 30) * 1000;
  }

  onApplicationBootstrap(): void {
    const interval = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error(`Error in periodic polling sweep: ${describeError(error)}`);
      });
    }, this.intervalMs);
    this.schedulerRegistry.addInterval(COMPLETION_POLLER_INTERVAL, interval);
    this.logger.log(`Polling tracked videos every ${this.intervalMs / 1000}s`);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', COMPLETION_POLLER_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(COMPLETION_POLLER_INTERVAL);
      this.logger.log('Periodic video polling stopped');
    }
  }

  /**
   * One pass over a snapshot of the registry. Jobs removed while the pass is
   * running are skipped or have their probe result dropped.
   */
  async sweep(): Promise<SweepSummary> {
    const summary: SweepSummary = { checked: 0, timedOut: 0, completed: 0, stale: 0, probeErrors: 0 };

    if (this.sweeping) {
      this.logger.debug('Previous sweep still running, skipping this tick');
      return summary;
    }

    this.sweeping = true;
    try {
      const jobs = this.registry.snapshot();
      if (jobs.length === 0) {
        return summary;
      }

      this.logger.log(`Polling status of ${jobs.length} tracked videos...`);

      for (const job of jobs) {
        summary.checked++;
        const result = await this.check(job);
        switch (result) {
          case 'timed-out':
            summary.timedOut++;
            break;
          case 'completed':
            summary.completed++;
            break;
          case 'stale':
            summary.stale++;
            break;
          case 'probe-error':
            summary.probeErrors++;
            break;
          case 'pending':
            break;
        }
      }

      return summary;
    } finally {
      this.sweeping = false;
    }
  }

  private async check(job: TrackedJob): Promise<JobCheck> {
    if (!this.registry.has(job.jobId)) {
      return 'stale';
    }

    // A job past its deadline is never also completed in the same tick
    if (this.coordinator.hasTimedOut(job)) {
      const expired = await this.coordinator.expire(job.jobId);
      return expired ? 'timed-out' : 'stale';
    }

    let variants: Variant[] | null;
    try {
      variants = await this.processing.probeCompletion(job.parkedHandle);
    } catch (error) {
      this.logger.warn(`Probe of job ${job.jobId} failed, retrying next tick: ${describeError(error)}`);
      return 'probe-error';
    }

    if (!variants || variants.length === 0) {
      return 'pending';
    }

    if (!this.registry.has(job.jobId)) {
      this.logger.log(`Job ${job.jobId} was cleaned up before its polling result could be processed`);
      return 'stale';
    }

    const completed = await this.coordinator.completionHandler(job.jobId, variants);
    return completed ? 'completed' : 'stale';
  }
}
