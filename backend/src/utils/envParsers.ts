/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty or not a number.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    if (typeof value !== "string" || value.trim().length === 0) {
        return fallback;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseEnvFloat(value: string | undefined, fallback: number): number {
    if (typeof value !== "string" || value.trim().length === 0) {
        return fallback;
    }
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}
