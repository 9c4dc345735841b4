import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { WaveFile } from "wavefile";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadMonoAudio } from "../src/audio/load";
import { decodeWav, encodeWav, writeWav } from "../src/audio/wav";
import { AnalysisError } from "../src/errors";

describe("WAV I/O", () => {
    let dir = "";

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "mosaic-wav-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("encodes mono 16-bit PCM and decodes it back", () => {
        const samples = Float32Array.from([0, 0.5, -0.5, 0.25]);
        const decoded = decodeWav(encodeWav(samples, 22050));
        expect(decoded.sampleRate).toBe(22050);
        expect(decoded.channels).toHaveLength(1);
        const ch = decoded.channels[0] ?? new Float32Array(0);
        expect(ch.length).toBe(4);
        Array.from(samples).forEach((s, i) => expect(ch[i]).toBeCloseTo(s, 3));
    });

    it("clips out-of-range samples", () => {
        const decoded = decodeWav(encodeWav(Float32Array.from([2, -3])));
        const ch = decoded.channels[0] ?? new Float32Array(0);
        expect(ch[0]).toBeCloseTo(1, 3);
        expect(ch[1]).toBeCloseTo(-1, 3);
    });

    it("downmixes stereo files to mono", async () => {
        const wave = new WaveFile();
        wave.fromScratch(2, 44100, "16", [
            [16384, 16384, 0],
            [0, -16384, 0],
        ]);
        const path = join(dir, "stereo.wav");
        await writeFile(path, wave.toBuffer());

        const mono = await loadMonoAudio(path);
        expect(mono.length).toBe(3);
        expect(mono[0]).toBeCloseTo(0.25, 3);
        expect(mono[1]).toBeCloseTo(0, 3);
        expect(mono[2]).toBe(0);
    });

    it("resamples to the analysis rate", async () => {
        const path = join(dir, "slow.wav");
        await writeWav(path, new Float32Array(22050).fill(0.5), 22050);
        const mono = await loadMonoAudio(path);
        expect(mono.length).toBe(44100);
        expect(mono[1000]).toBeCloseTo(0.5, 3);
    });

    it("reports unreadable and undecodable files as AnalysisError", async () => {
        await expect(loadMonoAudio(join(dir, "missing.wav"))).rejects.toThrow(AnalysisError);

        const path = join(dir, "noise.wav");
        await writeFile(path, "not a wav file");
        await expect(loadMonoAudio(path)).rejects.toThrow(`unsupported audio format in ${path}`);
    });
});
