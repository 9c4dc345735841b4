import { AnalysisError, errorMessage } from "../errors";
import { FEATURE_NAMES, MFCC_COEFFS, type FeatureName, type FeatureVector } from "../types";

import type { FeatureExtractor, FrameDescriptors } from "./featureExtractor";

/** Build a frozen vector over the full schema from a per-name lookup. */
export function makeFeatureVector(get: (name: FeatureName) => number): FeatureVector {
    const vector: Record<FeatureName, number> = {
        loudness: get("loudness"),
        mfcc_0: get("mfcc_0"),
        mfcc_1: get("mfcc_1"),
        mfcc_2: get("mfcc_2"),
        mfcc_3: get("mfcc_3"),
        mfcc_4: get("mfcc_4"),
        mfcc_5: get("mfcc_5"),
        mfcc_6: get("mfcc_6"),
        mfcc_7: get("mfcc_7"),
        mfcc_8: get("mfcc_8"),
        mfcc_9: get("mfcc_9"),
        mfcc_10: get("mfcc_10"),
        mfcc_11: get("mfcc_11"),
        mfcc_12: get("mfcc_12"),
        spectral_centroid: get("spectral_centroid"),
        danceability: get("danceability"),
        flux: get("flux"),
        hfc: get("hfc"),
        spectral_complexity: get("spectral_complexity"),
        pitch_salience: get("pitch_salience"),
        intensity: get("intensity"),
    };
    return Object.freeze(vector);
}

function descriptorValue(d: FrameDescriptors, name: FeatureName, frameLength: number): number {
    switch (name) {
        case "loudness":
            // Per-sample normalisation keeps variable-length frames comparable.
            return d.loudness / frameLength;
        case "spectral_centroid":
            return d.spectralCentroid;
        case "danceability":
            return d.danceability;
        case "flux":
            return d.flux;
        case "hfc":
            return d.hfc;
        case "spectral_complexity":
            return d.spectralComplexity;
        case "pitch_salience":
            return d.pitchSalience;
        case "intensity":
            return d.intensity;
        default: {
            const coeff = Number(name.slice("mfcc_".length));
            return d.mfcc[coeff] ?? NaN;
        }
    }
}

/**
 * Feature vector of one frame. Pure: the same samples always give the same vector.
 *
 * @throws AnalysisError when the extractor cannot process the frame or returns
 * an incomplete or non-finite result.
 */
export function buildFeatureVector(samples: Float32Array, extractor: FeatureExtractor): FeatureVector {
    if (samples.length === 0) {
        throw new AnalysisError("cannot analyse an empty frame");
    }

    let descriptors: FrameDescriptors;
    try {
        descriptors = extractor.extract(samples);
    } catch (err) {
        if (err instanceof AnalysisError) throw err;
        throw new AnalysisError(`feature extraction failed: ${errorMessage(err)}`, { cause: err });
    }

    if (descriptors.mfcc.length !== MFCC_COEFFS) {
        throw new AnalysisError(`expected ${MFCC_COEFFS} cepstral coefficients, got ${descriptors.mfcc.length}`);
    }

    const vector = makeFeatureVector((name) => descriptorValue(descriptors, name, samples.length));
    for (const name of FEATURE_NAMES) {
        if (!Number.isFinite(vector[name])) {
            throw new AnalysisError(`feature '${name}' is not finite (${vector[name]})`);
        }
    }
    return vector;
}
