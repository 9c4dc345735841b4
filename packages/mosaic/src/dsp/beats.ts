import { onsetEnvelopeFromSpectrogram } from "./onset";
import { peakPick } from "./peakPick";
import { monoAudio, spectrogram } from "./spectrogram";

export type BeatTrackerOptions = {
    fftSize?: number;
    hopSize?: number;
    /** Shortest allowed beat period. Default 0.25 s (240 BPM). */
    minIntervalSec?: number;
    /** Peaks must exceed mean + factor * std of the onset envelope. Default 0.5. */
    thresholdFactor?: number;
};

/**
 * Beat-like event positions (in samples, ascending) for event-synced segmentation.
 *
 * Peaks of a smoothed log-spectral onset envelope, spaced at least
 * `minIntervalSec` apart. Positions are rounded to whole samples. Silence
 * yields no events.
 */
export function trackBeats(samples: Float32Array, sampleRate: number, options: BeatTrackerOptions = {}): number[] {
    const fftSize = options.fftSize ?? 1024;
    const hopSize = options.hopSize ?? 512;
    if (samples.length < fftSize) return [];

    const spec = spectrogram(monoAudio(samples, sampleRate), { fftSize, hopSize, window: "hann" });
    const onset = onsetEnvelopeFromSpectrogram(spec, { smoothMs: 30 });

    const peaks = peakPick(onset.times, onset.values, {
        adaptiveFactor: options.thresholdFactor ?? 0.5,
        minIntervalSec: options.minIntervalSec ?? 0.25,
    });

    const positions: number[] = [];
    for (const p of peaks) {
        if (p.strength <= 0) continue;
        const pos = Math.round(p.time * sampleRate);
        const last = positions[positions.length - 1];
        if (last === undefined || pos > last) positions.push(pos);
    }
    return positions;
}
