/**
 * Key-Value Store Port
 *
 * Byte-oriented store behind the response and field mapping caches.
 * Implementations: Redis, In-Memory.
 */

export interface IKeyValueStore {
    /**
     * @returns The stored bytes, or null when missing or expired
     */
    get(key: string): Promise<Buffer | null>;

    /**
     * @param ttlSeconds - Optional TTL in seconds (default: no expiry)
     */
    set(key: string, value: Buffer | string, ttlSeconds?: number): Promise<void>;

    /**
     * @returns Number of keys removed
     */
    delete(...keys: string[]): Promise<number>;

    /**
     * Lists keys matching a glob pattern (`*` and `?` wildcards).
     */
    keys(pattern: string): Promise<string[]>;

    /**
     * Deletes every key matching a glob pattern.
     * @returns Number of keys removed
     */
    deleteMatching(pattern: string): Promise<number>;

    /**
     * Atomically increments an integer counter, creating it at 0 first.
     */
    incr(key: string): Promise<number>;
}
