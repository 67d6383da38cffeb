/**
 * Time and Size Formatting
 */

/**
 * Format a duration in seconds as H:MM:SS or M:SS
 */
export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);

  if (h > 0) {
    return `${h}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
  }
  return `${m}:${s.toString().padStart(2, '0')}`;
}

/**
 * Format seconds with fixed precision, e.g. "12.34s"
 */
export function formatSeconds(seconds: number, digits: number = 2): string {
  return `${seconds.toFixed(digits)}s`;
}

/**
 * ffmpeg accepts plain decimal seconds for -ss / -t
 */
export function toFFmpegTime(seconds: number): string {
  return seconds.toFixed(3);
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i] ?? 'B'}`;
}
