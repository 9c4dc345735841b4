import { AnalysisError } from "../src/errors";
import type { FeatureExtractor, FrameDescriptors } from "../src/analysis/featureExtractor";
import { makeFeatureVector } from "../src/analysis/featureVector";
import type { AudioLoader } from "../src/audio/wav";
import type { FeatureName, FeatureVector, Frame } from "../src/types";

export function constant(length: number, value: number): Float32Array {
    return new Float32Array(length).fill(value);
}

export function concat(...parts: Float32Array[]): Float32Array {
    const out = new Float32Array(parts.reduce((n, p) => n + p.length, 0));
    let off = 0;
    for (const p of parts) {
        out.set(p, off);
        off += p.length;
    }
    return out;
}

/**
 * Cheap stand-in for the DSP extractor: every cepstral coefficient is the frame
 * mean, loudness is the energy (so the vector holds the mean square), the rest is 0.
 */
export function meanExtractor(sampleRate = 44100): FeatureExtractor {
    return {
        sampleRate,
        extract(samples): FrameDescriptors {
            let sum = 0;
            let energy = 0;
            for (const x of samples) {
                sum += x;
                energy += x * x;
            }
            const m = sum / samples.length;
            return {
                loudness: energy,
                mfcc: new Array<number>(13).fill(m),
                spectralCentroid: 0,
                danceability: 0,
                flux: 0,
                hfc: 0,
                spectralComplexity: 0,
                pitchSalience: 0,
                intensity: 0,
            };
        },
    };
}

/** Loader over an in-memory map; unknown paths fail like an unreadable file. */
export function memoryLoader(files: ReadonlyMap<string, Float32Array>): AudioLoader {
    return async (path) => {
        const buffer = files.get(path);
        if (!buffer) throw new AnalysisError(`cannot read ${path}`, { path });
        return buffer;
    };
}

export function vector(values: Partial<Record<FeatureName, number>>): FeatureVector {
    return makeFeatureVector((name) => values[name] ?? 0);
}

export function frame(collectionId: string, frameIndex: number, startSample: number, endSample: number, sourcePath = `/sounds/${collectionId}.wav`): Frame {
    return { collectionId, frameIndex, sourcePath, startSample, endSample };
}
