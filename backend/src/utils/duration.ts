const UNIT_SECONDS: Record<string, number> = {
    s: 1,
    m: 60,
    h: 3600,
    d: 86400,
};

/**
 * Parse a duration such as `15m`, `7d` or a bare number of seconds.
 * Returns the duration in seconds, or `fallback` when the value is absent or unparseable.
 */
export function parseDuration(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;

    const trimmed = value.trim();
    if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10);

    const match = trimmed.match(/^(\d+)(s|m|h|d)$/);
    if (!match) return fallback;
    return parseInt(match[1], 10) * UNIT_SECONDS[match[2]];
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === '') return fallback;
    switch (value.trim().toLowerCase()) {
        case '1':
        case 'true':
        case 'yes':
        case 'on':
            return true;
        case '0':
        case 'false':
        case 'no':
        case 'off':
            return false;
        default:
            return fallback;
    }
}
