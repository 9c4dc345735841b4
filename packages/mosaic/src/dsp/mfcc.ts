import { ERROR_PREFIX } from "../errors";

import type { MelSpectrogram } from "./mel";

export type MfccOptions = {
    nCoeffs?: number;
};

export type MfccResult = {
    times: Float32Array;
    coeffs: Float32Array[]; // [frame][coeff]
};

function assertPositiveInt(name: string, v: number): void {
    if (!Number.isFinite(v) || v <= 0 || (v | 0) !== v) {
        throw new Error(`${ERROR_PREFIX}: ${name} must be a positive integer`);
    }
}

function buildDctMatrix(nCoeffs: number, nMels: number): Float32Array {
    // Orthonormal DCT-II. Shape: [nCoeffs][nMels]
    const out = new Float32Array(nCoeffs * nMels);

    const scale0 = Math.sqrt(1 / nMels);
    const scale = Math.sqrt(2 / nMels);

    for (let i = 0; i < nCoeffs; i++) {
        for (let j = 0; j < nMels; j++) {
            const c = Math.cos((Math.PI / nMels) * (j + 0.5) * i);
            out[i * nMels + j] = (i === 0 ? scale0 : scale) * c;
        }
    }

    return out;
}

export function mfcc(mel: MelSpectrogram, options: MfccOptions = {}): MfccResult {
    const nFrames = mel.times.length;
    const nMels = mel.melBands[0]?.length ?? 0;

    const nCoeffs = options.nCoeffs ?? 13;
    assertPositiveInt("options.nCoeffs", nCoeffs);
    if (nMels <= 0) {
        return { times: mel.times, coeffs: Array.from({ length: nFrames }, () => new Float32Array(nCoeffs)) };
    }

    const dct = buildDctMatrix(nCoeffs, nMels);

    const out: Float32Array[] = new Array(nFrames);
    for (let t = 0; t < nFrames; t++) {
        // melSpectrogram returns log10 energies; they are used directly as log-energy features.
        const x = mel.melBands[t] ?? new Float32Array(nMels);
        const c = new Float32Array(nCoeffs);

        for (let i = 0; i < nCoeffs; i++) {
            let sum = 0;
            const rowOff = i * nMels;
            for (let j = 0; j < nMels; j++) {
                sum += (dct[rowOff + j] ?? 0) * (x[j] ?? 0);
            }
            c[i] = sum;
        }

        out[t] = c;
    }

    return { times: mel.times, coeffs: out };
}

/** Per-coefficient mean over all frames. */
export function meanCoeffs(result: MfccResult, nCoeffs: number): Float64Array {
    const out = new Float64Array(nCoeffs);
    const n = result.coeffs.length;
    if (n === 0) return out;

    for (const row of result.coeffs) {
        for (let i = 0; i < nCoeffs; i++) out[i] = (out[i] ?? 0) + (row[i] ?? 0);
    }
    for (let i = 0; i < nCoeffs; i++) out[i] = (out[i] ?? 0) / n;
    return out;
}
