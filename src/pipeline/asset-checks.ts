import { AllowedFormat } from '../config/pipeline.config';
import { RejectionReason, VideoAsset } from './interfaces/job.interface';

export interface AssetCheckOptions {
  maxSizeBytes: number;
  allowedFormats: AllowedFormat[];
}

export function gigabytesToBytes(gigabytes: number): number {
  return Math.floor(gigabytes * 1024 * 1024 * 1024);
}

/**
 * Checks on the metadata the platform declared for the video. Unknown size,
 * codec or container never block a submission.
 *
 * @returns the rejection reason, or `null` when the asset may proceed
 */
export function checkAsset(asset: VideoAsset, options: AssetCheckOptions): RejectionReason | null {
  if (asset.fileSize > 0 && asset.fileSize > options.maxSizeBytes) {
    return 'too-large';
  }

  const codec = asset.codec?.trim().toLowerCase();
  const container = asset.container?.trim().toLowerCase();
  if (!codec || !container || options.allowedFormats.length === 0) {
    return null;
  }

  const allowed = options.allowedFormats.some(
    (format) => format.codec === codec && format.container === container,
  );
  return allowed ? null : 'unsupported-format';
}
