/**
 * Human-readable sizes, durations and speeds for terminal output.
 */

const MB = 1024 * 1024;

export function formatMegabytes(bytes: number): string {
  return `${(bytes / MB).toFixed(1)}MB`;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)}m${Math.floor(seconds % 60)}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h${minutes}m`;
}

export function formatSpeed(bytesPerSec: number): string {
  return `${(bytesPerSec / MB).toFixed(1)}MB/s`;
}

export function formatPercent(percentage: number): string {
  return `${percentage.toFixed(1).padStart(5)}%`;
}
