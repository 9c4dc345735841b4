import { OggVorbisDecoder } from "@wasm-audio-decoders/ogg-vorbis";

import { AnalysisError, errorMessage } from "../errors";
import type { DecodedAudio } from "./wav";

/**
 * Decode a complete Ogg Vorbis file. The wasm decoder is created per call
 * and freed before returning.
 *
 * @throws AnalysisError when the stream yields no audio.
 */
export async function decodeOggVorbis(bytes: Uint8Array, label = "<buffer>"): Promise<DecodedAudio> {
    const decoder = new OggVorbisDecoder();
    try {
        await decoder.ready;
        const result = await decoder.decodeFile(bytes);
        const firstError = result.errors[0];
        if (result.samplesDecoded === 0 && firstError) {
            throw new AnalysisError(`cannot decode Ogg Vorbis ${label}: ${firstError.message}`, { path: label });
        }
        if (result.channelData.length === 0 || result.sampleRate <= 0) {
            throw new AnalysisError(`Ogg Vorbis ${label} has no audio stream`, { path: label });
        }
        return { sampleRate: result.sampleRate, channels: result.channelData };
    } catch (err) {
        if (err instanceof AnalysisError) throw err;
        throw new AnalysisError(`cannot decode Ogg Vorbis ${label}: ${errorMessage(err)}`, { path: label, cause: err });
    } finally {
        decoder.free();
    }
}
