/**
 * Window helpers shared by the STFT and per-frame analysis.
 */

export function hannWindow(size: number): Float32Array {
    const w = new Float32Array(size);
    // Periodic Hann (common for STFT overlap-add).
    for (let n = 0; n < size; n++) {
        w[n] = 0.5 - 0.5 * Math.cos((2 * Math.PI * n) / size);
    }
    return w;
}

export function isPowerOfTwo(n: number): boolean {
    return n > 0 && (n & (n - 1)) === 0;
}
