export type PipelineErrorKind =
  | 'admission'
  | 'relocation'
  | 'scheduling'
  | 'delivery'
  | 'probe'
  | 'consistency';

/**
 * Base class for every failure the pipeline knows how to classify.
 * Gateways throw these; the coordinator turns them into outcomes and log lines.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Capacity exceeded. The caller may queue or retry later. */
export class AdmissionError extends PipelineError {
  readonly kind = 'admission';

  constructor(
    message: string,
    readonly reason: 'queue-full' | 'system-busy',
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** The asset could not be staged. Terminal for that submission. */
export class RelocationError extends PipelineError {
  readonly kind = 'relocation';
}

/** Parking failed after a successful relocation; the staged copy is orphaned. */
export class SchedulingError extends PipelineError {
  readonly kind = 'scheduling';
}

export class DeliveryError extends PipelineError {
  readonly kind = 'delivery';
}

/** Transient probe failure, retried on the next tick. */
export class ProbeError extends PipelineError {
  readonly kind = 'probe';
}

/** Ledger underflow, registry miss on an expected hit, duplicate tracking. */
export class ConsistencyError extends PipelineError {
  readonly kind = 'consistency';
}

/**
 * Format anything caught in a `catch` block for a log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof PipelineError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
