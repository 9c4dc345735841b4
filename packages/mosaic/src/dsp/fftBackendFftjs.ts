/**
 * `fft.js` backend.
 *
 * - `fft.js` performs an unnormalised forward FFT.
 * - The plan and the interleaved output buffer are allocated once per fftSize.
 */

import FFT from "fft.js";

import { ERROR_PREFIX } from "../errors";

import { isPowerOfTwo } from "./fft";
import type { FftBackend, FftComplexOutput } from "./fftBackend";

export function createFftJsBackend(fftSize: number): FftBackend {
    if (!Number.isFinite(fftSize) || fftSize <= 1 || (fftSize | 0) !== fftSize || !isPowerOfTwo(fftSize)) {
        throw new Error(`${ERROR_PREFIX}: fftSize must be a power of two > 1, got ${fftSize}`);
    }

    const fft = new FFT(fftSize);

    // `fft.js` uses interleaved complex arrays [re0, im0, re1, im1, ...].
    const outComplexInterleaved = fft.createComplexArray();

    const outReal = new Float32Array(fftSize);
    const outImag = new Float32Array(fftSize);

    return {
        fftSize,
        forwardReal(frame: Float32Array): FftComplexOutput {
            if (frame.length !== fftSize) {
                throw new Error(
                    `${ERROR_PREFIX}: FFT input length (${frame.length}) must equal fftSize (${fftSize})`
                );
            }

            // `completeSpectrum` fills the negative frequencies so we get N complex bins.
            fft.realTransform(outComplexInterleaved, frame);
            fft.completeSpectrum(outComplexInterleaved);

            for (let k = 0; k < fftSize; k++) {
                const re = outComplexInterleaved[2 * k] ?? 0;
                const im = outComplexInterleaved[2 * k + 1] ?? 0;
                // Canonicalise -0 -> +0 so silence comparisons are stable.
                outReal[k] = re === 0 ? 0 : re;
                outImag[k] = im === 0 ? 0 : im;
            }

            return { real: outReal, imag: outImag };
        }
    };
}
