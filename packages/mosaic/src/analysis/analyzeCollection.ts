import { trackBeats } from "../dsp/beats";
import { AnalysisError } from "../errors";
import { loadMonoAudio } from "../audio/load";
import type { AudioLoader } from "../audio/wav";
import type { CollectionEntry } from "../collection/manifest";
import { FeatureTable } from "../table/featureTable";
import type { FeatureRow, SegmentationMode } from "../types";
import { silentLogger, type Logger } from "../util/log";

import { createFeatureExtractor, type FeatureExtractor } from "./featureExtractor";
import { buildFeatureVector } from "./featureVector";
import { segment, toFrames } from "./segmenter";

export type AnalysisOptions = {
    frameSize: number;
    /** Segment on tracked beats instead of fixed-size frames. */
    syncWithBeats?: boolean;
    extractor?: FeatureExtractor;
    loadAudio?: AudioLoader;
    logger?: Logger;
};

export type SkippedFile = {
    collectionId: string;
    path: string;
    reason: string;
};

export type CollectionAnalysis = {
    table: FeatureTable;
    /** Files that could not be analysed, in manifest order. */
    skipped: SkippedFile[];
};

function segmentationMode(samples: Float32Array, options: AnalysisOptions, sampleRate: number): SegmentationMode {
    if (options.syncWithBeats) {
        return { kind: "events", positions: trackBeats(samples, sampleRate) };
    }
    return { kind: "fixed", frameSize: options.frameSize };
}

/**
 * Segment one recording and compute a feature vector per frame.
 *
 * All-or-nothing: if any frame fails, the whole file fails with `AnalysisError`.
 */
export async function analyzeSound(
    path: string,
    collectionId: string,
    options: AnalysisOptions
): Promise<FeatureRow[]> {
    const extractor = options.extractor ?? createFeatureExtractor();
    const load = options.loadAudio ?? ((p: string) => loadMonoAudio(p, extractor.sampleRate));

    const samples = await load(path);
    const bounds = segment(samples, segmentationMode(samples, options, extractor.sampleRate));
    const frames = toFrames(bounds, { collectionId, sourcePath: path });

    return frames.map((frame) => {
        try {
            return { frame, features: buildFeatureVector(samples.subarray(frame.startSample, frame.endSample), extractor) };
        } catch (err) {
            if (err instanceof AnalysisError) {
                throw new AnalysisError(`${path} frame ${frame.frameIndex}: ${err.detail}`, { path, cause: err });
            }
            throw err;
        }
    });
}

/**
 * Analyse every file of a source collection into one table.
 *
 * A file that raises `AnalysisError` is skipped (and reported); the batch goes on.
 * Any other error aborts the batch.
 */
export async function analyzeCollection(
    entries: readonly CollectionEntry[],
    options: AnalysisOptions,
    label = "source"
): Promise<CollectionAnalysis> {
    const logger = options.logger ?? silentLogger;
    const table = new FeatureTable(label);
    const skipped: SkippedFile[] = [];

    for (const [i, entry] of entries.entries()) {
        logger.info(`Analyzing sound with id ${entry.collectionId} [${i + 1}/${entries.length}]`);
        try {
            const rows = await analyzeSound(entry.path, entry.collectionId, options);
            table.append(rows);
        } catch (err) {
            if (!(err instanceof AnalysisError)) throw err;
            logger.warn(`Skipping ${entry.path}: ${err.detail}`);
            skipped.push({ collectionId: entry.collectionId, path: entry.path, reason: err.detail });
        }
    }

    logger.info(`Analyzed ${entries.length - skipped.length}/${entries.length} files into ${table.size} frames`);
    if (skipped.length > 0) {
        logger.warn(`${skipped.length} file(s) skipped`);
    }
    return { table, skipped };
}

/**
 * Analyse the target recording. Its path doubles as the collection id, and the
 * table's row order is the output order of the reconstruction.
 */
export async function analyzeTarget(path: string, options: AnalysisOptions, label = "target"): Promise<FeatureTable> {
    const logger = options.logger ?? silentLogger;
    logger.info(`Analyzing target sound: ${path}`);
    const rows = await analyzeSound(path, path, options);
    logger.info(`Target has ${rows.length} frames`);
    return new FeatureTable(label, rows);
}
