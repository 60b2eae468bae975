import { Owner } from './owner.interface';

/**
 * A video as reported by the bridge when it was posted. Metadata is whatever
 * the platform declared; nothing here is inspected by this service.
 */
export interface VideoAsset {
  sourceChatId: number;
  sourceMessageId: number;
  fileSize: number;
  duration: number;
  height?: number;
  codec?: string;
  container?: string;
}

/** One derived quality produced by the external processing. */
export interface Variant {
  fileId: string;
  height?: number;
  fileSize?: number;
}

export interface RelocatedAsset {
  stagingId: string;
  /** Non-empty when the staged copy was already processed on arrival. */
  variants: Variant[];
}

export interface TrackedJob {
  jobId: string;
  owner: Owner;
  parkedHandle: string;
  submittedAt: Date;
  originalSize: number;
  duration: number;
  height?: number;
  submissionId: string;
}

export interface QueueEntry {
  submissionId: string;
  owner: Owner;
  asset: VideoAsset;
  enqueuedAt: Date;
}

export type RejectionReason =
  | 'shutting-down'
  | 'queue-full'
  | 'system-busy'
  | 'too-large'
  | 'unsupported-format'
  | 'relocation-failed'
  | 'scheduling-failed';

export type SubmitOutcome =
  | { status: 'accepted'; submissionId: string; jobId: string; instant: boolean; estimatedMinutes: number }
  | { status: 'queued'; submissionId: string; position: number }
  | { status: 'rejected'; submissionId: string; reason: RejectionReason };

export type CancelOutcome =
  | { status: 'cancelled'; jobId?: string; submissionId?: string }
  | { status: 'nothing-to-cancel' };

export interface SweepSummary {
  checked: number;
  timedOut: number;
  completed: number;
  stale: number;
  probeErrors: number;
}

export interface ReconcileSummary {
  correctedCounters: number;
  prunedOwners: number;
  drainsRequested: number;
}

export interface PipelineStats {
  inFlight: number;
  pending: number;
  activeOwners: number;
  limits: {
    regular: number;
    premium: number;
    channel: number;
    queueSizeLimit: number;
    maxInFlight: number;
  };
  totals: {
    accepted: number;
    queued: number;
    rejected: number;
    completed: number;
    timedOut: number;
    cancelled: number;
  };
}
