/**
 * Linear-interpolation resampler.
 *
 * Good enough for analysis and for copying source segments between
 * recordings; not a band-limited converter.
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
    if (fromRate === toRate) {
        return samples;
    }

    const ratio = fromRate / toRate;
    const newLength = Math.floor(samples.length / ratio);
    if (newLength <= 0) {
        return new Float32Array(0);
    }

    const result = new Float32Array(newLength);

    for (let i = 0; i < newLength; i++) {
        const srcIndex = i * ratio;
        const lo = Math.floor(srcIndex);
        const frac = srcIndex - lo;

        const a = samples[lo] ?? 0;
        const b = samples[lo + 1] ?? a;
        result[i] = a + frac * (b - a);
    }

    return result;
}
