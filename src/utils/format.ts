/**
 * Display formatting helpers shared by the query engine and the CLI.
 */

/** Default preview length for source attributions */
export const DEFAULT_PREVIEW_LENGTH = 150;

/**
 * Truncate text to `maxLength` characters, appending "..." when cut.
 *
 * @example
 * ```typescript
 * truncateText('Hello world', 5)  // "Hello..."
 * truncateText('Short', 150)      // "Short"
 * ```
 */
export function truncateText(text: string, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength) + '...';
}

/**
 * Format a byte count with one decimal place.
 *
 * @example
 * ```typescript
 * formatFileSize(512)        // "512.0 B"
 * formatFileSize(1536)       // "1.5 KB"
 * formatFileSize(5242880)    // "5.0 MB"
 * ```
 */
export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(1)} ${units[unit]}`;
}

/**
 * Format milliseconds as a human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a similarity score for display (4 decimal places).
 */
export function formatScore(score: number): string {
  return score.toFixed(4);
}
