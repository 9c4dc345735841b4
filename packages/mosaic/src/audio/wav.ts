import { writeFile } from "node:fs/promises";

import { WaveFile } from "wavefile";
import { z } from "zod";

import { AnalysisError, errorMessage } from "../errors";
import { MOSAIC_SAMPLE_RATE } from "../types";

export type DecodedAudio = {
    sampleRate: number;
    /** One array per channel, samples in [-1, 1]. */
    channels: Float32Array[];
};

/** Decodes a file path to mono samples at the analysis rate. */
export type AudioLoader = (path: string) => Promise<Float32Array>;

const fmtSchema = z.object({
    sampleRate: z.number().int().positive(),
    numChannels: z.number().int().positive(),
});

/**
 * Decode a RIFF/RIFX WAV file of any PCM or float bit depth.
 *
 * @throws AnalysisError for unreadable or unsupported data.
 */
export function decodeWav(bytes: Uint8Array, label = "<buffer>"): DecodedAudio {
    let wave: WaveFile;
    let block: unknown;
    try {
        wave = new WaveFile(bytes);
        wave.toBitDepth("32f");
        block = wave.getSamples(false, Float64Array);
    } catch (err) {
        throw new AnalysisError(`cannot decode WAV ${label}: ${errorMessage(err)}`, { path: label, cause: err });
    }

    const fmt = fmtSchema.safeParse(wave.fmt);
    if (!fmt.success) {
        throw new AnalysisError(`WAV ${label} has no usable fmt chunk`, { path: label, cause: fmt.error });
    }

    const raw: unknown[] = Array.isArray(block) ? block : [block];
    const channels: Float32Array[] = [];
    for (const ch of raw) {
        if (!(ch instanceof Float64Array)) {
            throw new AnalysisError(`WAV ${label} returned no sample data`, { path: label });
        }
        channels.push(Float32Array.from(ch));
    }

    return { sampleRate: fmt.data.sampleRate, channels };
}

/** Single-channel 16-bit PCM WAV. Samples are clipped to [-1, 1]. */
export function encodeWav(samples: Float32Array, sampleRate = MOSAIC_SAMPLE_RATE): Uint8Array {
    const clipped = new Float32Array(samples.length);
    for (let i = 0; i < samples.length; i++) {
        clipped[i] = Math.max(-1, Math.min(1, samples[i] ?? 0));
    }

    const wave = new WaveFile();
    wave.fromScratch(1, sampleRate, "32f", clipped);
    wave.toBitDepth("16");
    return wave.toBuffer();
}

export async function writeWav(path: string, samples: Float32Array, sampleRate = MOSAIC_SAMPLE_RATE): Promise<void> {
    await writeFile(path, encodeWav(samples, sampleRate));
}
