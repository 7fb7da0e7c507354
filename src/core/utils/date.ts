/**
 * Date formatting utilities
 */

/**
 * Formats a duration in milliseconds to a human-readable string
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(ms: number): string {
  const s = Math.max(0, Math.floor(ms / 1000));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}

/** Minutes-precision stamp for history labels, e.g. 2025-09-02 10:42 */
export function formatStamp(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}
