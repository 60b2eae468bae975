import { Owner } from './owner.interface';
import { RelocatedAsset, Variant, VideoAsset } from './job.interface';

export const PROCESSING_GATEWAY = Symbol('PROCESSING_GATEWAY');
export const DELIVERY_GATEWAY = Symbol('DELIVERY_GATEWAY');
export const PLAN_POLICY = Symbol('PLAN_POLICY');

/**
 * Staging and parking at the platform side. The external processing itself is
 * never started or controlled from here; its side effects are only probed.
 */
export interface ProcessingGateway {
  /** @throws RelocationError */
  relocate(asset: VideoAsset): Promise<RelocatedAsset>;
  /** @throws SchedulingError */
  parkForProcessing(stagingId: string): Promise<string>;
  /**
   * `null` is the steady-state answer while processing is still running.
   * @throws ProbeError
   */
  probeCompletion(parkedHandle: string): Promise<Variant[] | null>;
  cancelParked(parkedHandle: string): Promise<void>;
}

export interface DeliveryGateway {
  /**
   * @returns how many variants reached the user
   * @throws DeliveryError
   */
  deliverResult(userId: number, variants: Variant[]): Promise<number>;
  /** @throws DeliveryError */
  replaceInPlace(channelId: number, messageId: number, variants: Variant[]): Promise<void>;
  notify(userId: number, text: string): Promise<void>;
  reportToOperator(text: string): Promise<void>;
}

export interface PlanPolicy {
  limitFor(owner: Owner): Promise<number>;
}
