/**
 * Formatting helpers for CLI output
 */

const SIZE_UNITS = ['Bytes', 'KB', 'MB', 'GB'] as const;

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 Bytes';

  const k = 1024;
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), SIZE_UNITS.length - 1);

  return `${Math.round((bytes / Math.pow(k, i)) * 100) / 100} ${SIZE_UNITS[i]}`;
}

/**
 * Format a duration in milliseconds as seconds with one decimal
 */
export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
