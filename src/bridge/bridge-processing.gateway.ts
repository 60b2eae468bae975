import { Injectable, Logger } from '@nestjs/common';
import { ProbeError, RelocationError, SchedulingError } from '../errors/pipeline.errors';
import { ProcessingGateway } from '../pipeline/interfaces/gateways.interface';
import { RelocatedAsset, Variant, VideoAsset } from '../pipeline/interfaces/job.interface';
import { BridgeClient, BridgeRequestError } from './bridge.client';
import { parkedSchema, probeSchema, relocatedSchema } from './bridge.schemas';

@Injectable()
export class BridgeProcessingGateway implements ProcessingGateway {
  private readonly logger = new Logger(BridgeProcessingGateway.name);

  constructor(private readonly bridge: BridgeClient) {}

  async relocate(asset: VideoAsset): Promise<RelocatedAsset> {
    try {
      const relocated = await this.bridge.request('POST', '/assets/relocate', relocatedSchema, asset);
      if (!relocated) {
        throw new RelocationError('Bridge returned no staging id');
      }
      return relocated;
    } catch (error) {
      if (error instanceof RelocationError) {
        throw error;
      }
      throw new RelocationError(
        `Could not relocate message ${asset.sourceMessageId} from chat ${asset.sourceChatId}`,
        { cause: error },
      );
    }
  }

  async parkForProcessing(stagingId: string): Promise<string> {
    const path = `/assets/${encodeURIComponent(stagingId)}/park`;
    try {
      const parked = await this.bridge.request('POST', path, parkedSchema);
      if (!parked) {
        throw new SchedulingError(`Bridge returned no handle for staged asset ${stagingId}`);
      }
      return parked.parkedHandle;
    } catch (error) {
      if (error instanceof SchedulingError) {
        throw error;
      }
      throw new SchedulingError(`Could not park staged asset ${stagingId}`, { cause: error });
    }
  }

  async probeCompletion(parkedHandle: string): Promise<Variant[] | null> {
    const path = `/parked/${encodeURIComponent(parkedHandle)}/variants`;
    const probe = await this.bridge.request('GET', path, probeSchema).catch((error: unknown) => {
      throw new ProbeError(`Could not probe parked asset ${parkedHandle}`, { cause: error });
    });

    if (!probe || probe.variants.length === 0) {
      return null;
    }
    return probe.variants;
  }

  async cancelParked(parkedHandle: string): Promise<void> {
    try {
      await this.bridge.call('DELETE', `/parked/${encodeURIComponent(parkedHandle)}`);
    } catch (error) {
      // Already gone at the platform side
      if (error instanceof BridgeRequestError && error.status === 404) {
        this.logger.debug(`Parked asset ${parkedHandle} was already removed`);
        return;
      }
      throw error;
    }
  }
}
