import type { Spectrogram } from "./spectrogram";

export type OnsetEnvelope = {
    times: Float32Array;
    values: Float32Array;
};

export type OnsetEnvelopeOptions = {
    /** Centered moving-average window in milliseconds. 0 disables smoothing. */
    smoothMs?: number;
};

export function movingAverage(values: Float32Array, windowFrames: number): Float32Array {
    if (windowFrames <= 1) return values;

    const n = values.length;
    const out = new Float32Array(n);
    const half = Math.floor(windowFrames / 2);

    const prefix = new Float64Array(n + 1);
    for (let i = 0; i < n; i++) {
        prefix[i + 1] = (prefix[i] ?? 0) + (values[i] ?? 0);
    }

    for (let i = 0; i < n; i++) {
        const start = Math.max(0, i - half);
        const end = Math.min(n, i + half + 1);
        out[i] = ((prefix[end] ?? 0) - (prefix[start] ?? 0)) / Math.max(1, end - start);
    }

    return out;
}

/**
 * Half-wave rectified difference of log1p magnitudes, averaged over bins.
 *
 * The first frame has no predecessor and is 0.
 */
export function onsetEnvelopeFromSpectrogram(spec: Spectrogram, options: OnsetEnvelopeOptions = {}): OnsetEnvelope {
    const smoothMs = options.smoothMs ?? 30;

    const nFrames = spec.times.length;
    const out = new Float32Array(nFrames);
    const nBins = (spec.fftSize >>> 1) + 1;

    for (let t = 1; t < nFrames; t++) {
        const cur = spec.magnitudes[t];
        const prev = spec.magnitudes[t - 1];
        if (!cur || !prev) continue;

        let sum = 0;
        for (let k = 0; k < nBins; k++) {
            const d = Math.log1p(cur[k] ?? 0) - Math.log1p(prev[k] ?? 0);
            if (d > 0) sum += d;
        }
        out[t] = sum / nBins;
    }

    if (smoothMs > 0 && nFrames >= 2) {
        const dt = (spec.times[1] ?? 0) - (spec.times[0] ?? 0);
        const windowFrames = Math.max(1, Math.round(smoothMs / 1000 / Math.max(1e-9, dt)));
        return { times: spec.times, values: movingAverage(out, windowFrames | 1) };
    }

    return { times: spec.times, values: out };
}
