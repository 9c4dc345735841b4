import { highFrequencyContent, pitchSalience, spectralCentroid, spectralComplexity, spectralFlux } from "../dsp/spectral";
import { danceability, intensity, loudness } from "../dsp/dynamics";
import { melSpectrogram } from "../dsp/mel";
import { meanCoeffs, mfcc } from "../dsp/mfcc";
import { monoAudio, spectrogram } from "../dsp/spectrogram";
import { AnalysisError } from "../errors";
import { MFCC_COEFFS, MOSAIC_SAMPLE_RATE } from "../types";
import { mean } from "../util/stats";

/** Raw per-frame descriptors, before loudness normalisation. */
export type FrameDescriptors = {
    loudness: number;
    /** Exactly `MFCC_COEFFS` values, in coefficient order. */
    mfcc: ArrayLike<number>;
    spectralCentroid: number;
    danceability: number;
    flux: number;
    hfc: number;
    spectralComplexity: number;
    pitchSalience: number;
    intensity: number;
};

/**
 * Computes acoustic descriptors for one mono frame.
 *
 * Implementations throw `AnalysisError` for frames they cannot process.
 */
export interface FeatureExtractor {
    readonly sampleRate: number;
    extract(samples: Float32Array): FrameDescriptors;
}

export type FeatureExtractorOptions = {
    sampleRate?: number;
    /** Internal STFT window. Frames shorter than this cannot be analysed. */
    fftSize?: number;
    hopSize?: number;
    nMels?: number;
};

/**
 * Default extractor: STFT over the frame, descriptors averaged across STFT frames.
 */
export function createFeatureExtractor(options: FeatureExtractorOptions = {}): FeatureExtractor {
    const sampleRate = options.sampleRate ?? MOSAIC_SAMPLE_RATE;
    const fftSize = options.fftSize ?? 2048;
    const hopSize = options.hopSize ?? fftSize / 2;
    const nMels = options.nMels ?? 40;

    return {
        sampleRate,
        extract(samples: Float32Array): FrameDescriptors {
            if (samples.length < fftSize) {
                throw new AnalysisError(
                    `frame of ${samples.length} samples is shorter than the ${fftSize}-sample analysis window`
                );
            }
            for (let i = 0; i < samples.length; i++) {
                if (!Number.isFinite(samples[i] ?? NaN)) {
                    throw new AnalysisError(`non-finite sample at index ${i}`);
                }
            }

            const spec = spectrogram(monoAudio(samples, sampleRate), { fftSize, hopSize, window: "hann" });
            const mel = melSpectrogram(spec, { nMels });

            return {
                loudness: loudness(samples),
                mfcc: meanCoeffs(mfcc(mel, { nCoeffs: MFCC_COEFFS }), MFCC_COEFFS),
                spectralCentroid: mean(spectralCentroid(spec)),
                danceability: danceability(samples, sampleRate),
                // Flux is undefined for the first STFT frame.
                flux: mean(spectralFlux(spec), 1),
                hfc: mean(highFrequencyContent(spec)),
                spectralComplexity: mean(spectralComplexity(spec)),
                pitchSalience: mean(pitchSalience(spec)),
                intensity: intensity(samples),
            };
        },
    };
}
