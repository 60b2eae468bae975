import {
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { CancelOutcome, PipelineStats, SubmitOutcome, TrackedJob } from './pipeline/interfaces/job.interface';
import { channelPostOwner, userOwner } from './pipeline/interfaces/owner.interface';
import { JobRegistryService } from './pipeline/job-registry.service';
import { LifecycleCoordinatorService } from './pipeline/lifecycle-coordinator.service';
import { channelSubmissionSchema, parseBody, userSubmissionSchema } from './submission.schemas';

@Controller()
export class AppController {
  constructor(
    private readonly coordinator: LifecycleCoordinatorService,
    private readonly registry: JobRegistryService,
    private logger: Logger,
  ) {}

  @Get('statistics')
  getStatistics(): PipelineStats {
    return this.coordinator.getStatistics();
  }

  @Post('submissions/user')
  async submitFromUser(@Body() body: unknown): Promise<SubmitOutcome> {
    const { userId, asset } = parseBody(userSubmissionSchema, body);
    this.logger.log(`Video submitted by user ${userId} (message ${asset.sourceMessageId})`);
    return this.coordinator.submit(userOwner(userId), asset);
  }

  @Post('submissions/channel')
  async submitFromChannel(@Body() body: unknown): Promise<SubmitOutcome> {
    const { channelId, messageId, asset } = parseBody(channelSubmissionSchema, body);
    this.logger.log(`Video posted in channel ${channelId} (post ${messageId})`);
    return this.coordinator.submit(channelPostOwner(channelId, messageId), asset);
  }

  @Delete('jobs/user/:userId')
  async cancelForUser(@Param('userId', ParseIntPipe) userId: number): Promise<CancelOutcome> {
    this.logger.log(`Cancellation request from user ${userId}`);
    return this.coordinator.cancel(userOwner(userId));
  }

  @Delete('jobs/channel/:channelId/:messageId')
  async cancelForChannelPost(
    @Param('channelId', ParseIntPipe) channelId: number,
    @Param('messageId', ParseIntPipe) messageId: number,
  ): Promise<CancelOutcome> {
    this.logger.log(`Cancellation request for channel ${channelId} post ${messageId}`);
    return this.coordinator.cancel(channelPostOwner(channelId, messageId));
  }

  @Get('jobs')
  getJobs(@Query('userId') userId?: string): TrackedJob[] {
    const jobs = this.registry.snapshot();
    if (userId === undefined) {
      return jobs;
    }
    const id = Number(userId);
    return jobs.filter((job) => job.owner.kind === 'user' && job.owner.userId === id);
  }
}
