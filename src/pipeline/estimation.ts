/**
 * Rough processing time in whole minutes. The platform produces one quality
 * per rung below the source height, plus the original.
 */
export function estimateProcessingMinutes(durationSeconds: number, height: number | undefined, factor: number): number {
  const qualities = qualitiesFor(height ?? 0);
  const minutes = durationSeconds / 60;
  return Math.floor(factor * minutes * qualities + 0.99);
}

function qualitiesFor(height: number): number {
  if (height >= 1080) return 4;
  if (height >= 720) return 3;
  return 2;
}

export interface VideoReport {
  originalSize: number;
  duration: number;
  processingMinutes: number;
  estimatedMinutes: number;
  qualitiesSent: number;
}

export function formatVideoReport(report: VideoReport): string {
  const durationMin = Math.floor(report.duration / 60);
  const durationSec = Math.floor(report.duration % 60);
  const sizeMb = report.originalSize / (1024 * 1024);

  return [
    `Original size: ${sizeMb.toFixed(2)} MB`,
    `Duration: ${durationMin}:${String(durationSec).padStart(2, '0')}`,
    `Processing time: ${report.processingMinutes.toFixed(2)} minutes`,
    `Estimated time: ${report.estimatedMinutes.toFixed(1)} minutes`,
    `Qualities sent: ${report.qualitiesSent}`,
  ].join('\n');
}
