import { resolve } from "node:path";

import { MOSAIC_SAMPLE_RATE } from "../types";
import { silentLogger, type Logger } from "../util/log";

import { loadMonoAudio } from "./load";
import type { AudioLoader } from "./wav";

/**
 * `[start, start + length)` of `buffer`, truncated at the end of the buffer.
 *
 * Never pads: a range that runs past the end yields only the available samples,
 * a range starting past the end yields an empty view.
 */
export function sliceSegment(buffer: Float32Array, start: number, length: number): Float32Array {
    const from = Math.min(Math.max(0, Math.floor(start)), buffer.length);
    const to = Math.min(buffer.length, from + Math.max(0, Math.floor(length)));
    return buffer.subarray(from, to);
}

export type SegmentCacheOptions = {
    loader?: AudioLoader;
    /** Decode rate of the default loader. Ignored when `loader` is given. */
    sampleRate?: number;
    logger?: Logger;
};

/**
 * Decoded-audio cache for one reconstruction run, keyed by absolute path.
 *
 * Each file is decoded at most once. Concurrent requests for a path that is still
 * decoding share the in-flight decode. Failed decodes are not cached. There is no
 * invalidation: files changing on disk during a run are not noticed.
 */
export class SegmentCache {
    private readonly buffers = new Map<string, Float32Array>();
    private readonly pending = new Map<string, Promise<Float32Array>>();
    private readonly loader: AudioLoader;
    private readonly logger: Logger;
    private decodes = 0;

    constructor(options: SegmentCacheOptions = {}) {
        const sampleRate = options.sampleRate ?? MOSAIC_SAMPLE_RATE;
        this.loader = options.loader ?? ((path) => loadMonoAudio(path, sampleRate));
        this.logger = options.logger ?? silentLogger;
    }

    static key(path: string): string {
        return resolve(path);
    }

    /** Number of decodes started so far (cache misses). */
    get decodeCount(): number {
        return this.decodes;
    }

    get size(): number {
        return this.buffers.size;
    }

    has(path: string): boolean {
        return this.buffers.has(SegmentCache.key(path));
    }

    /** Whole decoded buffer for `path`. */
    load(path: string): Promise<Float32Array> {
        const key = SegmentCache.key(path);

        const cached = this.buffers.get(key);
        if (cached) return Promise.resolve(cached);

        const inFlight = this.pending.get(key);
        if (inFlight) return inFlight;

        this.decodes++;
        this.logger.debug(`decoding ${key}`);
        const decode = this.loader(key).then(
            (buffer) => {
                // a clear() during the decode drops the result
                if (this.pending.get(key) === decode) {
                    this.buffers.set(key, buffer);
                    this.pending.delete(key);
                }
                return buffer;
            },
            (err: unknown) => {
                if (this.pending.get(key) === decode) this.pending.delete(key);
                throw err;
            }
        );
        this.pending.set(key, decode);
        return decode;
    }

    /**
     * Samples `[start, start + length)` of `path`, truncated at end of file.
     *
     * The result is a view into the cached buffer and must not be mutated.
     */
    async getSegment(path: string, start: number, length: number): Promise<Float32Array> {
        const buffer = await this.load(path);
        return sliceSegment(buffer, start, length);
    }

    /** Drops cached buffers and forgets in-flight decodes. */
    clear(): void {
        this.buffers.clear();
        this.pending.clear();
    }
}
