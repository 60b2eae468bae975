import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { describeError } from '../errors/pipeline.errors';
import { ReconcileSummary } from '../pipeline/interfaces/job.interface';
import { LifecycleCoordinatorService } from '../pipeline/lifecycle-coordinator.service';

@Injectable()
export class CleanupService {
  private readonly logger = new Logger(CleanupService.name);

  constructor(private readonly coordinator: LifecycleCoordinatorService) {}

  @Cron(CronExpression.EVERY_HOUR)
  async handleCleanup(): Promise<ReconcileSummary | undefined> {
    this.logger.log('Starting hourly reconciliation...');

    try {
      const statsBefore = this.coordinator.getStatistics();
      this.logger.log(
        `Stats before reconciliation: ${statsBefore.inFlight} in flight, ` +
        `${statsBefore.pending} queued, ${statsBefore.activeOwners} active owners`,
      );

      const summary = await this.coordinator.reconcile();

      if (summary.correctedCounters > 0) {
        this.logger.warn(`Corrected ${summary.correctedCounters} concurrency counters`);
      }
      if (summary.prunedOwners > 0) {
        this.logger.log(`Pruned ${summary.prunedOwners} stale active owners`);
      }
      if (summary.drainsRequested > 0) {
        this.logger.log(`Requested ${summary.drainsRequested} queue drains`);
      }

      const statsAfter = this.coordinator.getStatistics();
      this.logger.log(
        `Stats after reconciliation: ${statsAfter.inFlight} in flight, ` +
        `${statsAfter.pending} queued, ${statsAfter.activeOwners} active owners`,
      );

      return summary;
    } catch (error) {
      this.logger.error(`Error during reconciliation: ${describeError(error)}`);
      return undefined;
    }
  }
}
