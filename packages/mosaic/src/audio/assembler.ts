import type { FeatureTable } from "../table/featureTable";
import { frameLength, MOSAIC_SAMPLE_RATE, type FeatureRow, type MatchDecision, type ReconstructedAudio } from "../types";
import { silentLogger, type Logger } from "../util/log";

import type { SegmentCache } from "./segmentCache";

/** Picks the source frame for one target row. */
export type FrameChooser = (row: FeatureRow, index: number) => MatchDecision;

export type AssembleOptions = {
    /**
     * Output length in samples. Defaults to the decoded length of the target
     * recording (the first row's path).
     */
    totalLength?: number;
    sampleRate?: number;
    logger?: Logger;
};

/**
 * Rebuild the target from chosen source segments, hard-cut, in target order.
 *
 * Each target frame receives `frameLength` samples from the chosen frame's
 * start, written at the target frame's own start. A source that ends early
 * contributes only what it has; the rest of that range stays silent. Samples
 * outside every target frame (e.g. the dropped tail) stay 0.
 */
export async function assemble(
    target: FeatureTable,
    choose: FrameChooser,
    cache: SegmentCache,
    options: AssembleOptions = {}
): Promise<ReconstructedAudio> {
    const logger = options.logger ?? silentLogger;
    const sampleRate = options.sampleRate ?? MOSAIC_SAMPLE_RATE;

    let totalLength = options.totalLength;
    if (totalLength === undefined) {
        const first = target.rows()[0];
        totalLength = first ? (await cache.load(first.frame.sourcePath)).length : 0;
    }

    const samples = new Float32Array(totalLength);
    const provenance: string[] = [];

    logger.info(`Reconstructing ${target.size} frames into ${totalLength} samples`);

    for (const [i, row] of target.rows().entries()) {
        const decision = choose(row, i);
        provenance.push(decision.chosen.collectionId);

        const start = row.frame.startSample;
        const segment = await cache.getSegment(decision.chosen.sourcePath, decision.chosen.startSample, frameLength(row.frame));
        const writable = Math.max(0, Math.min(segment.length, totalLength - start));
        if (writable < segment.length) {
            logger.debug(`frame ${i}: output ends at ${totalLength}, dropping ${segment.length - writable} samples`);
        }
        if (writable > 0) samples.set(segment.subarray(0, writable), start);
    }

    return { sampleRate, samples, provenance };
}
