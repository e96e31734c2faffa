import { promises as fsPromises } from "fs";
import PQueue from "p-queue";
import { CacheError, getErrorCode, getErrorMessage } from "../utils/errors";
import { createLogger, Logger } from "../utils/logger";
import {
    buildCachePath,
    buildPartialFileName,
    decodeCacheFileName,
    encodeCacheFileName,
    isPartialFileName,
    normalizeFormatTag,
} from "./cacheHelpers";

export interface CacheEntryInfo {
    trackId: string;
    format: string;
    byteLength: number;
    lastAccessMs: number;
}

interface CacheEntryRecord extends CacheEntryInfo {
    fileName: string;
}

export interface TrackCacheOptions {
    directory: string;
    maxBytes: number;
    logger?: Logger;
    now?: () => number;
}

export interface TrackCacheStats {
    entries: number;
    totalBytes: number;
    maxBytes: number;
    pinnedKeys: number;
}

/**
 * On-disk audio cache keyed by track id with a byte budget and LRU eviction.
 * Mutations run one at a time; bytes land in a temp file and are renamed into
 * place so a reader never observes a partial blob.
 */
export class TrackCache {
    private readonly entries = new Map<string, CacheEntryRecord>();
    private readonly pins = new Map<string, number>();
    private readonly pendingWrites = new Map<string, Promise<void>>();
    private readonly mutations = new PQueue({ concurrency: 1 });
    private readonly log: Logger;
    private readonly now: () => number;
    private initialization: Promise<void> | null = null;
    private totalBytes = 0;
    private partialSequence = 0;

    constructor(private readonly options: TrackCacheOptions) {
        this.log = options.logger ?? createLogger("track-cache");
        this.now = options.now ?? Date.now;
    }

    get directory(): string {
        return this.options.directory;
    }

    get maxBytes(): number {
        return this.options.maxBytes;
    }

    /**
     * Indexes blobs left by a previous run, drops stale temp files and trims
     * the cache to its budget. Safe to call more than once.
     */
    initialize(): Promise<void> {
        if (!this.initialization) {
            this.initialization = this.mutations.add(() => this.restoreIndex());
        }
        return this.initialization;
    }

    has(trackId: string): boolean {
        return this.entries.has(trackId);
    }

    getEntry(trackId: string): CacheEntryInfo | null {
        const entry = this.entries.get(trackId);
        if (!entry) {
            return null;
        }
        const { fileName: _fileName, ...info } = entry;
        return info;
    }

    stats(): TrackCacheStats {
        return {
            entries: this.entries.size,
            totalBytes: this.totalBytes,
            maxBytes: this.options.maxBytes,
            pinnedKeys: this.pins.size,
        };
    }

    async put(trackId: string, bytes: Buffer, format: string): Promise<void> {
        await this.initialize();

        const write = this.mutations.add(() =>
            this.writeEntry(trackId, bytes, normalizeFormatTag(format))
        );
        const settled = write.then(
            () => undefined,
            () => undefined
        );
        this.pendingWrites.set(trackId, settled);

        try {
            await write;
        } finally {
            if (this.pendingWrites.get(trackId) === settled) {
                this.pendingWrites.delete(trackId);
            }
        }
    }

    /**
     * Returns the cached bytes or null on a miss. Refreshes the entry's
     * last-access time.
     */
    async get(trackId: string): Promise<Buffer | null> {
        await this.initialize();
        await this.pendingWrites.get(trackId);

        const entry = this.entries.get(trackId);
        if (!entry) {
            return null;
        }

        const filePath = buildCachePath(this.options.directory, entry.fileName);
        let bytes: Buffer;
        try {
            bytes = await fsPromises.readFile(filePath);
        } catch (error) {
            if (getErrorCode(error) === "ENOENT") {
                this.log.warn("Cache entry vanished from disk", { trackId });
                this.dropRecord(trackId);
                return null;
            }
            throw new CacheError(`Failed to read cached track ${trackId}`, {
                trackId,
                originalError: getErrorMessage(error),
            });
        }

        // Eviction may have replaced or removed the record while reading.
        if (this.entries.get(trackId) !== entry) {
            return this.entries.has(trackId) ? this.get(trackId) : null;
        }

        const accessedAt = this.now();
        entry.lastAccessMs = accessedAt;
        const accessedDate = new Date(accessedAt);
        fsPromises.utimes(filePath, accessedDate, accessedDate).catch((error) => {
            this.log.debug("Failed to refresh cache entry mtime", {
                trackId,
                error,
            });
        });
        return bytes;
    }

    async remove(trackId: string): Promise<boolean> {
        await this.initialize();
        return this.mutations.add(() => this.deleteEntry(trackId));
    }

    /** Protects an entry (present or future) from eviction. Reference counted. */
    pin(trackId: string): void {
        this.pins.set(trackId, (this.pins.get(trackId) ?? 0) + 1);
    }

    unpin(trackId: string): void {
        const count = this.pins.get(trackId);
        if (count === undefined) {
            return;
        }
        if (count <= 1) {
            this.pins.delete(trackId);
        } else {
            this.pins.set(trackId, count - 1);
        }
    }

    isPinned(trackId: string): boolean {
        return this.pins.has(trackId);
    }

    /**
     * Evicts least-recently-used unpinned entries until `incomingBytes` more
     * would fit. Returns the evicted track ids.
     */
    async evictIfNeeded(incomingBytes = 0): Promise<string[]> {
        await this.initialize();
        return this.mutations.add(() => this.evictLocked(incomingBytes));
    }

    private async restoreIndex(): Promise<void> {
        const directory = this.options.directory;
        try {
            await fsPromises.mkdir(directory, { recursive: true });
        } catch (error) {
            throw new CacheError(`Cache directory is not writable: ${directory}`, {
                originalError: getErrorMessage(error),
            });
        }

        let fileNames: string[];
        try {
            fileNames = await fsPromises.readdir(directory);
        } catch (error) {
            throw new CacheError(`Cache directory is not readable: ${directory}`, {
                originalError: getErrorMessage(error),
            });
        }

        for (const fileName of fileNames) {
            const filePath = buildCachePath(directory, fileName);

            if (isPartialFileName(fileName)) {
                await this.unlinkQuietly(fileName);
                continue;
            }

            const decoded = decodeCacheFileName(fileName);
            if (!decoded) {
                continue;
            }

            try {
                const stat = await fsPromises.stat(filePath);
                if (!stat.isFile()) {
                    continue;
                }
                this.setRecord({
                    trackId: decoded.trackId,
                    format: decoded.format,
                    fileName,
                    byteLength: stat.size,
                    lastAccessMs: stat.mtimeMs,
                });
            } catch (error) {
                this.log.warn("Skipping unreadable cache entry", {
                    fileName,
                    error,
                });
            }
        }

        this.log.debug("Track cache index restored", {
            entries: this.entries.size,
            totalBytes: this.totalBytes,
        });
        await this.evictLocked(0);
    }

    private async writeEntry(
        trackId: string,
        bytes: Buffer,
        format: string
    ): Promise<void> {
        const previous = this.entries.get(trackId);
        const reclaimed = previous?.byteLength ?? 0;
        await this.evictLocked(Math.max(0, bytes.length - reclaimed), trackId);

        const fileName = encodeCacheFileName(trackId, format);
        const finalPath = buildCachePath(this.options.directory, fileName);
        const partialPath = buildCachePath(
            this.options.directory,
            buildPartialFileName(fileName, ++this.partialSequence)
        );

        try {
            await fsPromises.writeFile(partialPath, bytes);
            await fsPromises.rename(partialPath, finalPath);
        } catch (error) {
            await fsPromises.rm(partialPath, { force: true }).catch((cleanupError) => {
                this.log.debug("Failed to remove partial cache file", {
                    partialPath,
                    error: cleanupError,
                });
            });
            throw new CacheError(`Failed to store track ${trackId}`, {
                trackId,
                code: getErrorCode(error),
                originalError: getErrorMessage(error),
            });
        }

        if (previous && previous.fileName !== fileName) {
            await this.unlinkQuietly(previous.fileName);
        }

        this.setRecord({
            trackId,
            format,
            fileName,
            byteLength: bytes.length,
            lastAccessMs: this.now(),
        });

        if (this.totalBytes > this.options.maxBytes) {
            this.log.warn("Track cache over budget; remaining entries are pinned", {
                totalBytes: this.totalBytes,
                maxBytes: this.options.maxBytes,
            });
        }
    }

    private async deleteEntry(trackId: string): Promise<boolean> {
        const entry = this.entries.get(trackId);
        if (!entry) {
            return false;
        }
        this.dropRecord(trackId);
        await this.unlinkQuietly(entry.fileName);
        return true;
    }

    private async evictLocked(
        incomingBytes: number,
        excludeTrackId?: string
    ): Promise<string[]> {
        const budget = this.options.maxBytes;
        if (this.totalBytes + incomingBytes <= budget) {
            return [];
        }

        const candidates = Array.from(this.entries.values())
            .filter(
                (entry) =>
                    entry.trackId !== excludeTrackId &&
                    !this.pins.has(entry.trackId)
            )
            .sort((a, b) => a.lastAccessMs - b.lastAccessMs);

        const evicted: string[] = [];
        for (const entry of candidates) {
            if (this.totalBytes + incomingBytes <= budget) {
                break;
            }
            this.dropRecord(entry.trackId);
            await this.unlinkQuietly(entry.fileName);
            evicted.push(entry.trackId);
        }

        if (evicted.length > 0) {
            this.log.debug("Evicted cached tracks", {
                evicted: evicted.length,
                totalBytes: this.totalBytes,
                maxBytes: budget,
            });
        }
        return evicted;
    }

    private setRecord(record: CacheEntryRecord): void {
        this.dropRecord(record.trackId);
        this.entries.set(record.trackId, record);
        this.totalBytes += record.byteLength;
    }

    private dropRecord(trackId: string): void {
        const existing = this.entries.get(trackId);
        if (existing) {
            this.totalBytes -= existing.byteLength;
            this.entries.delete(trackId);
        }
    }

    private async unlinkQuietly(fileName: string): Promise<void> {
        try {
            await fsPromises.rm(buildCachePath(this.options.directory, fileName), {
                force: true,
            });
        } catch (error) {
            this.log.warn("Failed to delete cache file", { fileName, error });
        }
    }
}
