import crypto from 'crypto';

/**
 * Short digest used to keep cache keys bounded. Not a security primitive.
 */
export function digest(input: string): string {
    return crypto.createHash('md5').update(input, 'utf8').digest('hex');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON with object keys sorted at every level, so equal values hash equally.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(value, (_key, current: unknown) => {
        if (!isRecord(current)) return current;
        const sorted: Record<string, unknown> = {};
        for (const key of Object.keys(current).sort()) {
            sorted[key] = current[key];
        }
        return sorted;
    });
}
