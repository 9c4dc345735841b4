import { createFftJsBackend } from "./fftBackendFftjs";

/** Full N-point complex spectrum; both arrays have length `fftSize`. */
export type FftComplexOutput = {
    real: Float32Array;
    imag: Float32Array;
};

/**
 * Real-input forward FFT used by the STFT. Output is unnormalised, so magnitudes
 * grow with the window sum.
 */
export interface FftBackend {
    readonly fftSize: number;

    /**
     * `input.length` must equal `fftSize`. The returned arrays are overwritten by
     * the next call.
     */
    forwardReal(input: Float32Array): FftComplexOutput;
}

const plans = new Map<number, FftBackend>();

/** Shared backend per size; planned on first use. */
export function getFftBackend(fftSize: number): FftBackend {
    let backend = plans.get(fftSize);
    if (!backend) {
        backend = createFftJsBackend(fftSize);
        plans.set(fftSize, backend);
    }
    return backend;
}
