import { describe, expect, it } from "vitest";

import { createFeatureExtractor, type FeatureExtractor } from "../src/analysis/featureExtractor";
import { buildFeatureVector } from "../src/analysis/featureVector";
import { AnalysisError } from "../src/errors";
import { FEATURE_NAMES } from "../src/types";

import { constant, meanExtractor } from "./helpers";

function sine(length: number, freq: number, amp: number, sampleRate = 44100): Float32Array {
    const out = new Float32Array(length);
    for (let i = 0; i < length; i++) out[i] = amp * Math.sin((2 * Math.PI * freq * i) / sampleRate);
    return out;
}

describe("buildFeatureVector", () => {
    it("fills every schema feature and normalises loudness per sample", () => {
        const v = buildFeatureVector(constant(4, 0.5), meanExtractor());
        expect(Object.keys(v)).toEqual([...FEATURE_NAMES]);
        // energy 4 * 0.25 = 1, over 4 samples
        expect(v.loudness).toBe(0.25);
        expect(v.mfcc_0).toBe(0.5);
        expect(v.mfcc_12).toBe(0.5);
        expect(v.hfc).toBe(0);
        expect(Object.isFrozen(v)).toBe(true);
    });

    it("rejects an empty frame", () => {
        expect(() => buildFeatureVector(new Float32Array(0), meanExtractor())).toThrow(AnalysisError);
    });

    it("wraps unexpected extractor failures", () => {
        const broken: FeatureExtractor = {
            sampleRate: 44100,
            extract() {
                throw new Error("boom");
            },
        };
        expect(() => buildFeatureVector(constant(8, 0), broken)).toThrow("feature extraction failed: boom");
    });

    it("rejects a wrong number of cepstral coefficients", () => {
        const extractor = meanExtractor();
        const short: FeatureExtractor = {
            sampleRate: 44100,
            extract: (samples) => ({ ...extractor.extract(samples), mfcc: [1, 2, 3] }),
        };
        expect(() => buildFeatureVector(constant(8, 0), short)).toThrow("expected 13 cepstral coefficients, got 3");
    });

    it("rejects non-finite features", () => {
        const extractor = meanExtractor();
        const nan: FeatureExtractor = {
            sampleRate: 44100,
            extract: (samples) => ({ ...extractor.extract(samples), flux: NaN }),
        };
        expect(() => buildFeatureVector(constant(8, 0), nan)).toThrow("feature 'flux' is not finite (NaN)");
    });
});

describe("default feature extractor", () => {
    const extractor = createFeatureExtractor();

    it("is deterministic for identical samples", () => {
        const samples = sine(8192, 440, 0.5);
        const a = buildFeatureVector(samples, extractor);
        const b = buildFeatureVector(Float32Array.from(samples), extractor);
        expect(b).toEqual(a);
    });

    it("describes a loud 440 Hz tone", () => {
        const v = buildFeatureVector(sine(8192, 440, 0.5), extractor);
        for (const name of FEATURE_NAMES) expect(Number.isFinite(v[name])).toBe(true);
        expect(v.intensity).toBe(1);
        expect(v.spectral_centroid).toBeGreaterThan(300);
        expect(v.spectral_centroid).toBeLessThan(700);
        expect(v.loudness).toBeGreaterThan(0);
    });

    it("classifies silence as relaxed with zero loudness", () => {
        const v = buildFeatureVector(new Float32Array(4096), extractor);
        expect(v.loudness).toBe(0);
        expect(v.intensity).toBe(-1);
    });

    it("rejects frames shorter than its analysis window", () => {
        expect(() => buildFeatureVector(new Float32Array(1000), extractor)).toThrow(
            "frame of 1000 samples is shorter than the 2048-sample analysis window"
        );
    });

    it("rejects non-finite samples", () => {
        const samples = new Float32Array(4096);
        samples[10] = Infinity;
        expect(() => buildFeatureVector(samples, extractor)).toThrow(AnalysisError);
    });
});
