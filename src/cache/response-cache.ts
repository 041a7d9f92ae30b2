import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_CACHE_DIR = '.citelens-cache';

const CacheEntrySchema = z.object({
    timestamp: z.number(),
    data: z.unknown(),
});

/**
 * Simple file-system cache for classifier responses.
 * Stores JSON files in a configurable cache directory.
 *
 * Cache key = SHA-256 of the caller's key (model id + request).
 * TTL = 24 hours by default.
 */
export class ResponseCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    /**
     * Build a cache key from its parts. Objects are serialized as JSON.
     */
    static keyOf(...parts: unknown[]): string {
        return parts.map((part) => (typeof part === 'string' ? part : JSON.stringify(part))).join('\u0000');
    }

    private makeKey(key: string): string {
        return createHash('sha256').update(key).digest('hex');
    }

    /**
     * Get a cached response, or null if not found/expired. A stored value that
     * does not match `schema` counts as a miss.
     */
    get<T>(key: string, schema: z.ZodType<T>): T | null {
        if (!this.enabled) return null;

        const filePath = join(this.cacheDir, `${this.makeKey(key)}.json`);
        if (!existsSync(filePath)) return null;

        let stored: unknown;
        try {
            stored = JSON.parse(readFileSync(filePath, 'utf-8'));
        } catch (error) {
            getLogger().warn({ error, filePath }, 'Unreadable cache entry ignored');
            return null;
        }

        const entry = CacheEntrySchema.safeParse(stored);
        if (!entry.success) {
            getLogger().warn({ filePath }, 'Malformed cache entry ignored');
            return null;
        }

        // Check TTL
        if (Date.now() - entry.data.timestamp > this.ttlMs) {
            getLogger().debug({ key: key.slice(0, 80) }, 'Cache expired');
            return null;
        }

        const value = schema.safeParse(entry.data.data);
        if (!value.success) {
            getLogger().warn(
                { filePath, issues: value.error.issues.map((issue) => issue.path.join('.')) },
                'Cached value failed validation, ignoring it'
            );
            return null;
        }

        getLogger().debug({ key: key.slice(0, 80) }, 'Cache hit');
        return value.data;
    }

    /**
     * Store a response in the cache.
     */
    set<T>(key: string, data: T): void {
        if (!this.enabled) return;

        const filePath = join(this.cacheDir, `${this.makeKey(key)}.json`);

        try {
            const entry = {
                timestamp: Date.now(),
                key: key.slice(0, 200), // Truncated for debugging
                data,
            };
            writeFileSync(filePath, JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Get cache stats.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        return { enabled: this.enabled, directory: this.cacheDir, ...directoryUsage(this.cacheDir) };
    }
}

/**
 * Entry count and total size of a cache directory (zero when absent).
 */
export function directoryUsage(cacheDir: string): { entries: number; bytes: number } {
    if (!existsSync(cacheDir)) return { entries: 0, bytes: 0 };

    const files = readdirSync(cacheDir).filter((file) => file.endsWith('.json'));
    let bytes = 0;
    for (const file of files) {
        bytes += statSync(join(cacheDir, file)).size;
    }
    return { entries: files.length, bytes };
}

/**
 * Delete a cache directory. Returns false when there was nothing to clear.
 */
export function clearCache(cacheDir: string = DEFAULT_CACHE_DIR): boolean {
    if (!existsSync(cacheDir)) return false;
    rmSync(cacheDir, { recursive: true, force: true });
    return true;
}
