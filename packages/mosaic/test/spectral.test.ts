import { describe, expect, it } from "vitest";

import { danceability } from "../src/dsp/dynamics";
import { highFrequencyContent, pitchSalience, spectralComplexity, spectralFlux } from "../src/dsp/spectral";
import { monoAudio, spectrogram, type Spectrogram } from "../src/dsp/spectrogram";

/** Spectrogram with the given per-frame magnitudes; fftSize follows the bin count. */
function frames(sampleRate: number, rows: number[][]): Spectrogram {
    const nBins = rows[0]?.length ?? 1;
    return {
        sampleRate,
        fftSize: (nBins - 1) * 2,
        hopSize: nBins - 1,
        times: Float32Array.from(rows, (_, i) => i),
        magnitudes: rows.map((r) => Float32Array.from(r)),
    };
}

function oneHot(nBins: number, bin: number, value: number): number[] {
    return Array.from({ length: nBins }, (_, k) => (k === bin ? value : 0));
}

function average(values: Float32Array): number {
    return values.reduce((a, b) => a + b, 0) / Math.max(1, values.length);
}

function sine(hz: number, length: number, sampleRate = 44100): Float32Array {
    return Float32Array.from({ length }, (_, i) => 0.5 * Math.sin((2 * Math.PI * hz * i) / sampleRate));
}

describe("spectralFlux", () => {
    it("is zero for a stationary spectrum", () => {
        const a = oneHot(9, 2, 1);
        expect(Array.from(spectralFlux(frames(16, [a, a, a])))).toEqual([0, 0, 0]);
    });

    it("measures the change between normalised spectra", () => {
        // level does not matter, only the shape: two disjoint one-hot spectra differ by 2
        const flux = spectralFlux(frames(16, [oneHot(9, 2, 1), oneHot(9, 2, 1), oneHot(9, 5, 3)]));
        expect(Array.from(flux)).toEqual([0, 0, 2]);
    });

    it("restarts after a silent frame", () => {
        const flux = spectralFlux(frames(16, [oneHot(9, 2, 1), new Array<number>(9).fill(0), oneHot(9, 5, 1)]));
        expect(Array.from(flux)).toEqual([0, 0, 0]);
    });
});

describe("highFrequencyContent", () => {
    it("weights energy by bin index", () => {
        // fftSize 16: magnitudes are scaled by 2/16, so 8 becomes 1
        const hfc = highFrequencyContent(frames(16, [oneHot(9, 2, 8), oneHot(9, 6, 8)]));
        expect(Array.from(hfc)).toEqual([2, 6]);
    });

    it("is higher for a 5 kHz tone than for a 200 Hz tone", () => {
        const config = { fftSize: 1024, hopSize: 512, window: "hann" } as const;
        const high = average(highFrequencyContent(spectrogram(monoAudio(sine(5000, 4096), 44100), config)));
        const low = average(highFrequencyContent(spectrogram(monoAudio(sine(200, 4096), 44100), config)));
        expect(high).toBeGreaterThan(10 * low);
    });
});

describe("spectralComplexity", () => {
    it("counts the peaks of a three-partial spectrum", () => {
        // bin 7 is a local bump below the threshold (0.02 * 2/16 <= 0.005)
        const mix = [0, 8, 0, 4, 4, 0, 1, 0.02, 0];
        expect(Array.from(spectralComplexity(frames(16, [mix])))).toEqual([3]);
    });

    it("is zero for silence", () => {
        expect(Array.from(spectralComplexity(frames(16, [new Array<number>(9).fill(0)])))).toEqual([0]);
    });
});

describe("pitchSalience", () => {
    // fftSize 64 at 6400 Hz: 100 Hz per bin, lags 1..32 are searched
    const nBins = 33;

    it("is high for a harmonic comb", () => {
        const comb = Array.from({ length: nBins }, (_, k) => (k % 4 === 0 ? 1 : 0));
        const [value] = pitchSalience(frames(6400, [comb]));
        expect(value).toBeCloseTo(701 / 792, 5);
    });

    it("is near zero for a single partial", () => {
        const [value] = pitchSalience(frames(6400, [oneHot(nBins, 10, 1)]));
        expect(value).toBeCloseTo(10 / 1056, 5);
    });

    it("ranks a comb above a single partial and a flat spectrum", () => {
        const comb = Array.from({ length: nBins }, (_, k) => (k % 4 === 0 ? 1 : 0));
        const flat = new Array<number>(nBins).fill(1);
        const values = pitchSalience(frames(6400, [comb, oneHot(nBins, 10, 1), flat]));
        expect(values[0]).toBeGreaterThan(values[1] ?? 1);
        expect(values[2]).toBe(0);
    });
});

describe("danceability", () => {
    it("is 0 when fewer than two scales fit", () => {
        // 70 samples at 1 kHz: 7 envelope blocks, only scale 3 fits
        const pulses = Float32Array.from({ length: 70 }, (_, i) => (i < 10 ? 1 : 0));
        expect(danceability(pulses, 1000)).toBe(0);
    });

    it("is 0 for a flat envelope", () => {
        expect(danceability(new Float32Array(10000).fill(0.5), 1000)).toBe(0);
    });

    it("is positive for a pulsed envelope", () => {
        // 50 ms on, 450 ms off, for 10 seconds
        const pulses = Float32Array.from({ length: 10000 }, (_, i) => (i % 500 < 50 ? 1 : 0));
        expect(danceability(pulses, 1000)).toBeGreaterThan(0);
    });
});
