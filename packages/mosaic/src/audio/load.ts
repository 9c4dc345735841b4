import { readFile } from "node:fs/promises";

import { resample } from "../dsp/resample";
import { mixToMono } from "../dsp/spectrogram";
import { AnalysisError, errorMessage } from "../errors";
import { MOSAIC_SAMPLE_RATE } from "../types";
import { decodeOggVorbis } from "./ogg";
import { decodeWav, type DecodedAudio } from "./wav";

export type AudioContainer = "wav" | "ogg";

const MAGIC: ReadonlyArray<[string, AudioContainer]> = [
    ["RIFF", "wav"],
    ["RIFX", "wav"],
    ["RF64", "wav"],
    ["OggS", "ogg"],
];

/** Identify the container from its first four bytes. */
export function sniffContainer(bytes: Uint8Array): AudioContainer | undefined {
    if (bytes.length < 4) return undefined;
    const tag = String.fromCharCode(bytes[0] ?? 0, bytes[1] ?? 0, bytes[2] ?? 0, bytes[3] ?? 0);
    return MAGIC.find(([magic]) => magic === tag)?.[1];
}

export async function decodeAudio(bytes: Uint8Array, label = "<buffer>"): Promise<DecodedAudio> {
    switch (sniffContainer(bytes)) {
        case "wav":
            return decodeWav(bytes, label);
        case "ogg":
            return decodeOggVorbis(bytes, label);
        default:
            throw new AnalysisError(`unsupported audio format in ${label} (expected WAV or Ogg Vorbis)`, { path: label });
    }
}

export function toMono(audio: DecodedAudio, sampleRate = MOSAIC_SAMPLE_RATE): Float32Array {
    const channels = audio.channels;
    const mono = mixToMono({
        sampleRate: audio.sampleRate,
        numberOfChannels: channels.length,
        getChannelData: (channel) => channels[channel] ?? new Float32Array(0),
    });
    return resample(mono, audio.sampleRate, sampleRate);
}

/** Read a WAV or Ogg Vorbis file as mono at `sampleRate` (downmixed, then resampled). */
export async function loadMonoAudio(path: string, sampleRate = MOSAIC_SAMPLE_RATE): Promise<Float32Array> {
    let bytes: Uint8Array;
    try {
        bytes = await readFile(path);
    } catch (err) {
        throw new AnalysisError(`cannot read ${path}: ${errorMessage(err)}`, { path, cause: err });
    }
    const decoded = await decodeAudio(bytes, path);
    if (decoded.channels.length === 0) {
        throw new AnalysisError(`${path} has no channels`, { path });
    }
    return toMono(decoded, sampleRate);
}
