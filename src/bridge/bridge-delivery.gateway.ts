import { Injectable } from '@nestjs/common';
import { DeliveryError } from '../errors/pipeline.errors';
import { DeliveryGateway } from '../pipeline/interfaces/gateways.interface';
import { Variant } from '../pipeline/interfaces/job.interface';
import { BridgeClient } from './bridge.client';
import { deliveredSchema } from './bridge.schemas';

@Injectable()
export class BridgeDeliveryGateway implements DeliveryGateway {
  constructor(private readonly bridge: BridgeClient) {}

  async deliverResult(userId: number, variants: Variant[]): Promise<number> {
    try {
      const delivered = await this.bridge.request('POST', `/users/${userId}/deliveries`, deliveredSchema, {
        variants,
      });
      return delivered?.sent ?? 0;
    } catch (error) {
      throw new DeliveryError(`Could not deliver ${variants.length} variants to user ${userId}`, {
        cause: error,
      });
    }
  }

  async replaceInPlace(channelId: number, messageId: number, variants: Variant[]): Promise<void> {
    try {
      await this.bridge.call('PUT', `/channels/${channelId}/posts/${messageId}/media`, { variants });
    } catch (error) {
      throw new DeliveryError(`Could not replace media of channel ${channelId} post ${messageId}`, {
        cause: error,
      });
    }
  }

  async notify(userId: number, text: string): Promise<void> {
    await this.bridge.call('POST', `/users/${userId}/notices`, { text });
  }

  async reportToOperator(text: string): Promise<void> {
    await this.bridge.call('POST', '/operator/reports', { text });
  }
}
