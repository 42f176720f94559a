import Redis from 'ioredis';
import { IKeyValueStore } from '../../domain/ports/IKeyValueStore';

const SCAN_BATCH_SIZE = 100;

/**
 * Redis Key-Value Store
 *
 * Backs the response and field mapping caches. Every command failure is
 * logged and reported as a miss or no-op so callers keep going.
 */
export class RedisKeyValueStore implements IKeyValueStore {
    private client: Redis;

    constructor(connection: Redis | string) {
        if (typeof connection !== 'string') {
            this.client = connection;
            return;
        }

        this.client = new Redis(connection, {
            retryStrategy: (times) => Math.min(times * 50, 2000),
            maxRetriesPerRequest: 3
        });

        this.client.on('error', (err) => {
            console.error('[RedisKeyValueStore] Connection error:', err);
        });
    }

    async get(key: string): Promise<Buffer | null> {
        try {
            return await this.client.getBuffer(key);
        } catch (error) {
            console.error(`[RedisKeyValueStore] Get failed [${key}]:`, error);
            return null;
        }
    }

    async set(key: string, value: Buffer | string, ttlSeconds?: number): Promise<void> {
        try {
            if (ttlSeconds && ttlSeconds > 0) {
                await this.client.set(key, value, 'EX', ttlSeconds);
            } else {
                await this.client.set(key, value);
            }
        } catch (error) {
            console.error(`[RedisKeyValueStore] Set failed [${key}]:`, error);
        }
    }

    async delete(...keys: string[]): Promise<number> {
        if (keys.length === 0) return 0;
        try {
            return await this.client.del(...keys);
        } catch (error) {
            console.error(`[RedisKeyValueStore] Delete failed [${keys.join(', ')}]:`, error);
            return 0;
        }
    }

    async keys(pattern: string): Promise<string[]> {
        const found: string[] = [];
        try {
            let cursor = '0';
            do {
                const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_BATCH_SIZE);
                found.push(...batch);
                cursor = next;
            } while (cursor !== '0');
        } catch (error) {
            console.error(`[RedisKeyValueStore] Scan failed [${pattern}]:`, error);
        }
        return [...new Set(found)];
    }

    async deleteMatching(pattern: string): Promise<number> {
        const matches = await this.keys(pattern);
        let deleted = 0;
        for (let i = 0; i < matches.length; i += SCAN_BATCH_SIZE) {
            deleted += await this.delete(...matches.slice(i, i + SCAN_BATCH_SIZE));
        }
        return deleted;
    }

    async incr(key: string): Promise<number> {
        try {
            return await this.client.incr(key);
        } catch (error) {
            console.error(`[RedisKeyValueStore] Incr failed [${key}]:`, error);
            return 0;
        }
    }

    /**
     * Gracefully close the Redis connection.
     */
    async disconnect(): Promise<void> {
        await this.client.quit();
    }
}
