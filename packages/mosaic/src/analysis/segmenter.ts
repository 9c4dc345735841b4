import { InvalidConfigError } from "../errors";
import type { Frame, FrameBounds, SegmentationMode } from "../types";

/** Odd frame sizes are bumped to the next even integer. */
export function evenFrameSize(frameSize: number): number {
    if (!Number.isInteger(frameSize) || frameSize <= 0) {
        throw new InvalidConfigError(`frameSize must be a positive integer, got ${frameSize}`);
    }
    return frameSize % 2 === 0 ? frameSize : frameSize + 1;
}

function pairAdjacent(boundaries: readonly number[]): FrameBounds[] {
    const out: FrameBounds[] = [];
    for (let i = 0; i + 1 < boundaries.length; i++) {
        const start = boundaries[i];
        const end = boundaries[i + 1];
        if (start === undefined || end === undefined) continue;
        out.push({ start, end });
    }
    return out;
}

/**
 * Fixed-size frames over `[0, totalSamples)`.
 *
 * Boundaries are every multiple of the frame size below `totalSamples`; adjacent
 * boundaries are paired and the last one (no successor) is dropped, so the tail
 * after the last full frame is never emitted.
 */
export function segmentFixed(totalSamples: number, frameSize: number): FrameBounds[] {
    const size = evenFrameSize(frameSize);
    const boundaries: number[] = [];
    for (let b = 0; b < totalSamples; b += size) boundaries.push(b);
    return pairAdjacent(boundaries);
}

/**
 * One frame per consecutive pair of event positions.
 *
 * Positions are rounded; those outside `[0, totalSamples]` or not strictly
 * increasing are discarded, so every frame has `start < end <= totalSamples`.
 */
export function segmentByEvents(totalSamples: number, positions: readonly number[]): FrameBounds[] {
    const boundaries: number[] = [];
    for (const p of positions) {
        if (!Number.isFinite(p)) continue;
        const pos = Math.round(p);
        if (pos < 0 || pos > totalSamples) continue;
        const last = boundaries[boundaries.length - 1];
        if (last !== undefined && pos <= last) continue;
        boundaries.push(pos);
    }
    return pairAdjacent(boundaries);
}

/** Zero frames is a valid result (empty or too-short input). */
export function segment(samples: ArrayLike<number>, mode: SegmentationMode): FrameBounds[] {
    switch (mode.kind) {
        case "fixed":
            return segmentFixed(samples.length, mode.frameSize);
        case "events":
            return segmentByEvents(samples.length, mode.positions);
    }
}

export function toFrames(
    bounds: readonly FrameBounds[],
    parent: { collectionId: string; sourcePath: string }
): Frame[] {
    return bounds.map((b, frameIndex) =>
        Object.freeze({
            collectionId: parent.collectionId,
            frameIndex,
            sourcePath: parent.sourcePath,
            startSample: b.start,
            endSample: b.end,
        })
    );
}
