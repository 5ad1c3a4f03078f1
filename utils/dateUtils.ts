/**
 * Date Utilities
 */

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date as "YYYY-MM-DD HH:mm:ss" in local time.
 */
export function formatLocalTimestamp(date: Date = new Date()): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}

/**
 * Whole seconds since the Unix epoch.
 */
export function toUnixSeconds(epochMs: number): number {
    return Math.floor(epochMs / 1000);
}
