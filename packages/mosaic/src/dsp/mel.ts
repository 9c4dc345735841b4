import { ERROR_PREFIX } from "../errors";

import type { Spectrogram } from "./spectrogram";

export type MelConfig = {
    nMels: number;
};

export type MelSpectrogram = {
    times: Float32Array;
    melBands: Float32Array[]; // [frame][mel]
};

function assertPositiveInt(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0 || (value | 0) !== value) {
        throw new Error(`${ERROR_PREFIX}: ${name} must be a positive integer`);
    }
}

/** HTK mel scale. */
export function hzToMel(hz: number): number {
    return 2595 * Math.log10(1 + hz / 700);
}

export function melToHz(mel: number): number {
    return 700 * (Math.pow(10, mel / 2595) - 1);
}

/** `nMels` triangular filters spanning 0 Hz to Nyquist. */
function buildMelFilterBank(sampleRate: number, fftSize: number, nMels: number): Float32Array[] {
    const nBins = (fftSize >>> 1) + 1;

    // nMels triangular filters defined by nMels+2 mel points.
    const melMax = hzToMel(sampleRate / 2);

    const binHz = sampleRate / fftSize;
    const binPoints = new Int32Array(nMels + 2);
    for (let i = 0; i < binPoints.length; i++) {
        const hz = melToHz((i * melMax) / (nMels + 1));
        binPoints[i] = Math.max(0, Math.min(nBins - 1, Math.round(hz / binHz)));
    }

    const filters: Float32Array[] = new Array(nMels);
    for (let m = 0; m < nMels; m++) {
        const left = binPoints[m] ?? 0;
        const center = binPoints[m + 1] ?? 0;
        const right = binPoints[m + 2] ?? 0;

        const w = new Float32Array(nBins);
        if (center === left || right === center) {
            filters[m] = w;
            continue;
        }

        for (let k = left; k < center; k++) {
            w[k] = (k - left) / (center - left);
        }
        for (let k = center; k < right; k++) {
            w[k] = (right - k) / (right - center);
        }

        filters[m] = w;
    }

    return filters;
}

/**
 * Log10 mel spectrogram projected from an existing spectrogram.
 *
 * Output is aligned to `spec.times`.
 */
export function melSpectrogram(spec: Spectrogram, config: MelConfig): MelSpectrogram {
    assertPositiveInt("config.nMels", config.nMels);

    const filters = buildMelFilterBank(spec.sampleRate, spec.fftSize, config.nMels);

    const nFrames = spec.times.length;
    const nMels = filters.length;
    const out: Float32Array[] = new Array(nFrames);

    const eps = 1e-12;

    for (let t = 0; t < nFrames; t++) {
        const mags = spec.magnitudes[t];
        const bands = new Float32Array(nMels);
        if (mags) {
            for (let m = 0; m < nMels; m++) {
                const w = filters[m];
                if (!w) continue;

                let sum = 0;
                for (let k = 0; k < mags.length; k++) {
                    sum += (mags[k] ?? 0) * (w[k] ?? 0);
                }
                bands[m] = Math.log10(eps + sum);
            }
        }
        out[t] = bands;
    }

    return { times: spec.times, melBands: out };
}
