// Texts sent to submitting users. Anything else goes to the operator only.

export const SYSTEM_BUSY =
  'The processing queue is full right now. Please send your video again in a few minutes.';

export const COULD_NOT_START =
  'Your video could not be sent for processing. Please try again later.';

export const VIDEO_TOO_LARGE = (maxSizeGb: number): string =>
  `This video is too large. The maximum supported size is ${maxSizeGb} GB.`;

export const UNSUPPORTED_FORMAT =
  'This video format is not supported. Please send an H.264 or HEVC video in MP4 or MKV.';

export const QUEUED = (position: number): string =>
  `You already have videos processing. This one is queued at position ${position} and will start automatically.`;

export const PROCESSING_STARTED = (estimatedMinutes: number): string =>
  estimatedMinutes > 0
    ? `Processing started. Estimated time: about ${estimatedMinutes} minute${estimatedMinutes === 1 ? '' : 's'}.`
    : 'Processing started.';

export const PROCESSING_TIMEOUT = (minutes: number): string =>
  `Your video processing timed out after ${minutes.toFixed(1)} minutes. This can happen with unusual files or under heavy load.`;

