import type { Spectrogram } from "./spectrogram";

/**
 * Per-frame spectral descriptors.
 *
 * Every function returns one value per frame, aligned 1:1 with `spec.times`.
 * Where an absolute level matters (HFC, peak threshold), magnitudes are first
 * divided by the Hann window sum (fftSize / 2), so a full-scale sine peaks near 0.5.
 */

function amplitudeScale(spec: Spectrogram): number {
    return 2 / spec.fftSize;
}

/** Spectral centroid per frame (Hz). */
export function spectralCentroid(spec: Spectrogram): Float32Array {
    const nFrames = spec.times.length;
    const out = new Float32Array(nFrames);

    const nBins = (spec.fftSize >>> 1) + 1;
    const binHz = spec.sampleRate / spec.fftSize;

    for (let t = 0; t < nFrames; t++) {
        const mags = spec.magnitudes[t];
        if (!mags) {
            out[t] = 0;
            continue;
        }

        let num = 0;
        let den = 0;

        // DC..Nyquist inclusive.
        for (let k = 0; k < nBins; k++) {
            const m = mags[k] ?? 0;
            num += k * binHz * m;
            den += m;
        }

        out[t] = den > 0 ? num / den : 0;
    }

    return out;
}

/**
 * Spectral flux per frame (unitless).
 *
 * L1 distance between successive *normalised* magnitude spectra.
 * The first frame (and any frame after a silent one) is 0.
 */
export function spectralFlux(spec: Spectrogram): Float32Array {
    const nFrames = spec.times.length;
    const out = new Float32Array(nFrames);

    const nBins = (spec.fftSize >>> 1) + 1;

    let prev: Float32Array | null = null;

    for (let t = 0; t < nFrames; t++) {
        const mags = spec.magnitudes[t];
        if (!mags) {
            out[t] = 0;
            prev = null;
            continue;
        }

        let sum = 0;
        for (let k = 0; k < nBins; k++) sum += mags[k] ?? 0;

        if (sum <= 0) {
            out[t] = 0;
            prev = null;
            continue;
        }

        const cur = new Float32Array(nBins);
        const inv = 1 / sum;
        for (let k = 0; k < nBins; k++) cur[k] = (mags[k] ?? 0) * inv;

        if (!prev) {
            out[t] = 0;
            prev = cur;
            continue;
        }

        let flux = 0;
        for (let k = 0; k < nBins; k++) {
            flux += Math.abs((cur[k] ?? 0) - (prev[k] ?? 0));
        }

        out[t] = flux;
        prev = cur;
    }

    return out;
}

/** High-frequency content (Masri): sum of k * |X_k|^2. */
export function highFrequencyContent(spec: Spectrogram): Float32Array {
    const nFrames = spec.times.length;
    const out = new Float32Array(nFrames);
    const scale = amplitudeScale(spec);

    for (let t = 0; t < nFrames; t++) {
        const mags = spec.magnitudes[t];
        if (!mags) continue;

        let sum = 0;
        for (let k = 0; k < mags.length; k++) {
            const m = (mags[k] ?? 0) * scale;
            sum += k * m * m;
        }
        out[t] = sum;
    }

    return out;
}

export type SpectralComplexityOptions = {
    /** Minimum (window-normalised) peak magnitude. Default 0.005. */
    magnitudeThreshold?: number;
};

/** Number of spectral peaks above a magnitude threshold. */
export function spectralComplexity(spec: Spectrogram, options: SpectralComplexityOptions = {}): Float32Array {
    const nFrames = spec.times.length;
    const out = new Float32Array(nFrames);
    const threshold = options.magnitudeThreshold ?? 0.005;
    const scale = amplitudeScale(spec);

    for (let t = 0; t < nFrames; t++) {
        const mags = spec.magnitudes[t];
        if (!mags) continue;

        let peaks = 0;
        for (let k = 1; k < mags.length - 1; k++) {
            const m = mags[k] ?? 0;
            if (m * scale <= threshold) continue;
            if (m > (mags[k - 1] ?? 0) && m >= (mags[k + 1] ?? 0)) peaks++;
        }
        out[t] = peaks;
    }

    return out;
}

export type PitchSalienceOptions = {
    lowBoundaryHz?: number;
    highBoundaryHz?: number;
};

/**
 * Pitch salience per frame, in [0, 1].
 *
 * Ratio of the highest autocorrelation value of the mean-removed magnitude
 * spectrum, over lags between `lowBoundaryHz` (default 100) and `highBoundaryHz`
 * (default 5000), to the zero-lag autocorrelation. Harmonic sounds score high;
 * flat spectra and single partials score near 0.
 */
export function pitchSalience(spec: Spectrogram, options: PitchSalienceOptions = {}): Float32Array {
    const nFrames = spec.times.length;
    const out = new Float32Array(nFrames);

    const binHz = spec.sampleRate / spec.fftSize;
    const nBins = (spec.fftSize >>> 1) + 1;
    const lagLo = Math.max(1, Math.ceil((options.lowBoundaryHz ?? 100) / binHz));
    const lagHi = Math.min(nBins - 1, Math.floor((options.highBoundaryHz ?? 5000) / binHz));

    for (let t = 0; t < nFrames; t++) {
        const mags = spec.magnitudes[t];
        if (!mags) continue;

        let mean = 0;
        for (let k = 0; k < nBins; k++) mean += mags[k] ?? 0;
        mean /= nBins;

        const centred = new Float64Array(nBins);
        let r0 = 0;
        for (let k = 0; k < nBins; k++) {
            const m = (mags[k] ?? 0) - mean;
            centred[k] = m;
            r0 += m * m;
        }
        if (r0 <= 0) continue;

        let best = 0;
        for (let lag = lagLo; lag <= lagHi; lag++) {
            let r = 0;
            for (let k = 0; k + lag < nBins; k++) {
                r += (centred[k] ?? 0) * (centred[k + lag] ?? 0);
            }
            if (r > best) best = r;
        }

        out[t] = best / r0;
    }

    return out;
}
