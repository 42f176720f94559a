/**
 * In-Memory Key-Value Store
 *
 * Map-backed store for development and tests. Supports TTL and Redis-style
 * glob patterns (`*`, `?`, backslash escapes).
 */

import { IKeyValueStore } from '../../domain/ports/IKeyValueStore';

interface StoreEntry {
    value: Buffer;
    expiresAt: number | null; // null = no expiry
}

export function globToRegExp(pattern: string): RegExp {
    let source = '';
    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i];
        if (char === '\\' && i + 1 < pattern.length) {
            source += pattern[++i].replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
        } else if (char === '*') {
            source += '.*';
        } else if (char === '?') {
            source += '.';
        } else {
            source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
        }
    }
    return new RegExp(`^${source}$`, 's');
}

export class InMemoryKeyValueStore implements IKeyValueStore {
    private store: Map<string, StoreEntry> = new Map();

    constructor(private readonly now: () => number = Date.now) { }

    private readEntry(key: string): StoreEntry | null {
        const entry = this.store.get(key);
        if (!entry) return null;

        if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
            this.store.delete(key);
            return null;
        }
        return entry;
    }

    async get(key: string): Promise<Buffer | null> {
        const entry = this.readEntry(key);
        return entry ? Buffer.from(entry.value) : null;
    }

    async set(key: string, value: Buffer | string, ttlSeconds?: number): Promise<void> {
        const expiresAt = ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null;
        const bytes = typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value);
        this.store.set(key, { value: bytes, expiresAt });
    }

    async delete(...keys: string[]): Promise<number> {
        let deleted = 0;
        for (const key of keys) {
            if (this.readEntry(key) && this.store.delete(key)) deleted++;
        }
        return deleted;
    }

    async keys(pattern: string): Promise<string[]> {
        const matcher = globToRegExp(pattern);
        return [...this.store.keys()].filter(key => matcher.test(key) && this.readEntry(key) !== null);
    }

    async deleteMatching(pattern: string): Promise<number> {
        return this.delete(...await this.keys(pattern));
    }

    async incr(key: string): Promise<number> {
        const entry = this.readEntry(key);
        const next = (entry ? Number.parseInt(entry.value.toString('utf8'), 10) || 0 : 0) + 1;
        this.store.set(key, { value: Buffer.from(String(next), 'utf8'), expiresAt: entry?.expiresAt ?? null });
        return next;
    }

    /**
     * Current number of entries, expired ones included until cleaned up.
     */
    size(): number {
        return this.store.size;
    }

    /**
     * Removes expired entries (call periodically in long-running processes).
     */
    cleanup(): number {
        const now = this.now();
        let cleaned = 0;

        for (const [key, entry] of this.store.entries()) {
            if (entry.expiresAt !== null && now >= entry.expiresAt) {
                this.store.delete(key);
                cleaned++;
            }
        }

        return cleaned;
    }
}
