/**
 * Pure Logic Helpers
 * Extracted for testability
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Format a byte count for display, e.g. 1536 -> "1.50 KB"
 */
export function formatByteLength(bytes: number): string {
    let value = Math.max(0, bytes);
    let unit = 0;
    while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    if (unit === 0) return `${value} B`;
    return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

/**
 * Display name of a volume node, zero padded to three digits
 */
export function formatVolumeName(volume: number): string {
    return `Volume ${String(volume).padStart(3, '0')}`;
}

/**
 * Extract the first run of digits from a file name
 * @returns the number, or -1 when the name holds no digits
 */
export function extractFirstNumber(name: string): number {
    if (!name) return -1;
    const match = /\d+/.exec(name);
    if (!match) return -1;
    const num = parseInt(match[0], 10);
    return Number.isSafeInteger(num) ? num : -1;
}
