/**
 * Level and rhythm descriptors computed directly on the sample buffer.
 */

/** Stevens' power law over signal energy: (sum x^2)^0.67. */
export function loudness(samples: Float32Array): number {
    let energy = 0;
    for (let i = 0; i < samples.length; i++) {
        const x = samples[i] ?? 0;
        energy += x * x;
    }
    return Math.pow(energy, 0.67);
}

export function rms(samples: Float32Array, start = 0, end = samples.length): number {
    const n = end - start;
    if (n <= 0) return 0;

    let sum = 0;
    for (let i = start; i < end; i++) {
        const x = samples[i] ?? 0;
        sum += x * x;
    }
    return Math.sqrt(sum / n);
}

/** RMS level in dBFS; -Infinity for digital silence. */
export function rmsDb(samples: Float32Array): number {
    const r = rms(samples);
    return r > 0 ? 20 * Math.log10(r) : -Infinity;
}

export type IntensityClass = -1 | 0 | 1;

export type IntensityOptions = {
    /** At or below: relaxed. Default -30 dBFS. */
    relaxedBelowDb?: number;
    /** Above: aggressive. Default -12 dBFS. */
    aggressiveAboveDb?: number;
};

/** -1 relaxed, 0 moderate, 1 aggressive. */
export function intensity(samples: Float32Array, options: IntensityOptions = {}): IntensityClass {
    const db = rmsDb(samples);
    if (db <= (options.relaxedBelowDb ?? -30)) return -1;
    if (db > (options.aggressiveAboveDb ?? -12)) return 1;
    return 0;
}

export type DanceabilityOptions = {
    /** Envelope block length in seconds. Default 0.01. */
    blockSec?: number;
    /** Smallest DFA scale, in blocks. Default 3. */
    minScale?: number;
};

/** Block-wise RMS envelope. A trailing partial block is ignored. */
export function rmsEnvelope(samples: Float32Array, blockSize: number): Float64Array {
    const nBlocks = Math.floor(samples.length / blockSize);
    const out = new Float64Array(nBlocks);
    for (let b = 0; b < nBlocks; b++) {
        out[b] = rms(samples, b * blockSize, (b + 1) * blockSize);
    }
    return out;
}

// Root-mean-square residual of piecewise linear fits over windows of length `scale`.
function fluctuation(profile: Float64Array, scale: number): number {
    const nWin = Math.floor(profile.length / scale);
    if (nWin <= 0) return 0;

    // x = 0..scale-1; closed-form least squares.
    const xMean = (scale - 1) / 2;
    let sxx = 0;
    for (let x = 0; x < scale; x++) sxx += (x - xMean) * (x - xMean);

    let residual = 0;
    for (let w = 0; w < nWin; w++) {
        const off = w * scale;

        let yMean = 0;
        for (let x = 0; x < scale; x++) yMean += profile[off + x] ?? 0;
        yMean /= scale;

        let sxy = 0;
        for (let x = 0; x < scale; x++) sxy += (x - xMean) * ((profile[off + x] ?? 0) - yMean);
        const slope = sxx > 0 ? sxy / sxx : 0;

        for (let x = 0; x < scale; x++) {
            const fit = yMean + slope * (x - xMean);
            const d = (profile[off + x] ?? 0) - fit;
            residual += d * d;
        }
    }

    return Math.sqrt(residual / (nWin * scale));
}

/**
 * Danceability from detrended fluctuation analysis of the RMS envelope.
 *
 * Mean of 1/alpha over successive log-spaced scales, where alpha is the local
 * DFA scaling exponent. Returns 0 when fewer than two scales fit in the signal
 * or the envelope is flat.
 */
export function danceability(samples: Float32Array, sampleRate: number, options: DanceabilityOptions = {}): number {
    const blockSize = Math.max(1, Math.round((options.blockSec ?? 0.01) * sampleRate));
    const envelope = rmsEnvelope(samples, blockSize);
    const n = envelope.length;

    let envMean = 0;
    for (let i = 0; i < n; i++) envMean += envelope[i] ?? 0;
    envMean = n > 0 ? envMean / n : 0;

    const profile = new Float64Array(n);
    let acc = 0;
    for (let i = 0; i < n; i++) {
        acc += (envelope[i] ?? 0) - envMean;
        profile[i] = acc;
    }

    const minScale = Math.max(2, options.minScale ?? 3);
    const maxScale = Math.floor(n / 2);
    const scales: number[] = [];
    for (let s = minScale; s <= maxScale; s = Math.max(s + 1, Math.round(s * 1.2))) {
        scales.push(s);
    }
    if (scales.length < 2) return 0;

    let sum = 0;
    let count = 0;
    for (let i = 0; i + 1 < scales.length; i++) {
        const s0 = scales[i] ?? 0;
        const s1 = scales[i + 1] ?? 0;
        const f0 = fluctuation(profile, s0);
        const f1 = fluctuation(profile, s1);
        if (f0 <= 0 || f1 <= 0) continue;

        const alpha = (Math.log(f1) - Math.log(f0)) / (Math.log(s1) - Math.log(s0));
        if (alpha > 0) {
            sum += 1 / alpha;
            count++;
        }
    }

    return count > 0 ? sum / count : 0;
}
