import { ERROR_PREFIX } from "../errors";

import { hannWindow, isPowerOfTwo } from "./fft";
import { getFftBackend } from "./fftBackend";

export type AudioBufferLike = {
    sampleRate: number;
    getChannelData(channel: number): Float32Array;
    numberOfChannels: number;
};

export type SpectrogramConfig = {
    fftSize: number;
    hopSize: number;
    window: "hann";
};

export type Spectrogram = {
    sampleRate: number;
    fftSize: number;
    hopSize: number;
    times: Float32Array; // seconds (center of each frame)
    magnitudes: Float32Array[]; // [frame][bin]
};

function assertPositiveInt(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0 || (value | 0) !== value) {
        throw new Error(`${ERROR_PREFIX}: ${name} must be a positive integer`);
    }
}

export function mixToMono(audio: AudioBufferLike): Float32Array {
    const nCh = audio.numberOfChannels;
    if (nCh <= 0) {
        throw new Error(`${ERROR_PREFIX}: audio.numberOfChannels must be >= 1`);
    }

    if (nCh === 1) {
        return audio.getChannelData(0);
    }

    const length = audio.getChannelData(0).length;
    const out = new Float32Array(length);

    for (let ch = 0; ch < nCh; ch++) {
        const data = audio.getChannelData(ch);
        if (data.length !== length) {
            throw new Error(`${ERROR_PREFIX}: all channels must have equal length`);
        }
        for (let i = 0; i < length; i++) {
            out[i] = (out[i] ?? 0) + (data[i] ?? 0);
        }
    }

    const inv = 1 / nCh;
    for (let i = 0; i < length; i++) out[i] = (out[i] ?? 0) * inv;

    return out;
}

/**
 * Magnitude STFT over 'valid' windows only (no padding).
 *
 * A signal shorter than one window yields zero frames.
 */
export function spectrogram(audio: AudioBufferLike, config: SpectrogramConfig): Spectrogram {
    assertPositiveInt("config.fftSize", config.fftSize);
    assertPositiveInt("config.hopSize", config.hopSize);

    if (config.window !== "hann") {
        throw new Error(`${ERROR_PREFIX}: unsupported window '${String(config.window)}'`);
    }

    const fftSize = config.fftSize;
    if (!isPowerOfTwo(fftSize)) {
        throw new Error(`${ERROR_PREFIX}: config.fftSize must be a power of two`);
    }

    const hopSize = config.hopSize;
    if (hopSize > fftSize) {
        throw new Error(`${ERROR_PREFIX}: config.hopSize must be <= config.fftSize`);
    }

    const sr = audio.sampleRate;
    const mono = mixToMono(audio);

    const nFrames = Math.max(0, 1 + Math.floor((mono.length - fftSize) / hopSize));

    const times = new Float32Array(nFrames);
    const mags: Float32Array[] = new Array(nFrames);

    const window = hannWindow(fftSize);
    const fft = getFftBackend(fftSize);

    // Reused across frames.
    const windowedFrame = new Float32Array(fftSize);
    const nBins = (fftSize >>> 1) + 1;

    for (let frame = 0; frame < nFrames; frame++) {
        const start = frame * hopSize;

        // time is the center of the analysis window.
        times[frame] = (start + fftSize / 2) / sr;

        for (let i = 0; i < fftSize; i++) {
            windowedFrame[i] = (mono[start + i] ?? 0) * (window[i] ?? 0);
        }

        const { real, imag } = fft.forwardReal(windowedFrame);

        // Only keep the real-input half-spectrum [0..N/2] inclusive.
        const out = new Float32Array(nBins);
        for (let k = 0; k < nBins; k++) {
            out[k] = Math.hypot(real[k] ?? 0, imag[k] ?? 0);
        }
        mags[frame] = out;
    }

    return {
        sampleRate: sr,
        fftSize,
        hopSize,
        times,
        magnitudes: mags
    };
}

/** Wrap a mono buffer so it can be passed to `spectrogram`. */
export function monoAudio(samples: Float32Array, sampleRate: number): AudioBufferLike {
    return {
        sampleRate,
        numberOfChannels: 1,
        getChannelData: () => samples,
    };
}
