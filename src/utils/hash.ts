import { createHash } from 'crypto';

/**
 * Compute SHA256 hash of a value
 * Uses canonical JSON serialization for deterministic hashing
 */
export function computeHash(value: unknown): string {
    const canonical = canonicalize(value);
    return createHash('sha256').update(canonical).digest('hex');
}

/**
 * Canonicalize JSON for deterministic hashing
 * - Sort object keys
 * - No whitespace
 */
function canonicalize(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (typeof value !== 'object') return JSON.stringify(value);
    if (Array.isArray(value)) {
        return '[' + value.map(canonicalize).join(',') + ']';
    }

    const pairs = Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, inner]) => `"${key}":${canonicalize(inner)}`);
    return '{' + pairs.join(',') + '}';
}

/**
 * Deterministic request key for submitting one task to one provider.
 * Formatted as a UUID so services that expect one accept it.
 */
export function computeRequestId(localId: string, provider: string): string {
    const hex = computeHash({ localId, provider });
    return [
        hex.substring(0, 8),
        hex.substring(8, 12),
        hex.substring(12, 16),
        hex.substring(16, 20),
        hex.substring(20, 32),
    ].join('-');
}
