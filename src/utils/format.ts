const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Formats a byte count using the largest unit that keeps the value below 1024.
 * Anything past 1024 TB stays in TB.
 */
export function formatSize(bytes: number, decimals = 2): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(decimals)} ${unit}`;
    }
    size /= 1024;
  }
  // the loop divided once more after TB
  return `${(size * 1024).toFixed(decimals)} TB`;
}
