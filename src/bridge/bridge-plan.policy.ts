import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError } from '../errors/pipeline.errors';
import { PlanPolicy } from '../pipeline/interfaces/gateways.interface';
import { Owner } from '../pipeline/interfaces/owner.interface';
import { BridgeClient } from './bridge.client';
import { planSchema } from './bridge.schemas';

@Injectable()
export class BridgePlanPolicy implements PlanPolicy {
  private readonly logger = new Logger(BridgePlanPolicy.name);
  private readonly regularLimit: number;
  private readonly premiumLimit: number;
  private readonly channelLimit: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly bridge: BridgeClient,
  ) {
    this.regularLimit = this.configService.get<number>('MAX_CONCURRENT_VIDEOS_REGULAR', 1);
    this.premiumLimit = this.configService.get<number>('MAX_CONCURRENT_VIDEOS_PREMIUM', 5);
    this.channelLimit = this.configService.get<number>('MAX_CONCURRENT_VIDEOS_CHANNEL', 5);
  }

  async limitFor(owner: Owner): Promise<number> {
    if (owner.kind === 'channel-post') {
      return this.channelLimit;
    }

    try {
      const plan = await this.bridge.request('GET', `/users/${owner.userId}/plan`, planSchema);
      return plan?.premium ? this.premiumLimit : this.regularLimit;
    } catch (error) {
      this.logger.warn(`Plan lookup for user ${owner.userId} failed, using regular limit: ${describeError(error)}`);
      return this.regularLimit;
    }
  }
}
