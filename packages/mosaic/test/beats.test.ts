import { describe, expect, it } from "vitest";

import { analyzeSound } from "../src/analysis/analyzeCollection";
import { trackBeats } from "../src/dsp/beats";

import { meanExtractor } from "./helpers";

const SR = 44100;
const CLICKS_SEC = [0.25, 0.75, 1.25, 1.75];

function clickTrack(): Float32Array {
    const out = new Float32Array(SR * 2);
    for (const t of CLICKS_SEC) {
        const start = Math.round(t * SR);
        for (let i = 0; i < 256; i++) {
            out[start + i] = 0.9 * Math.sin((2 * Math.PI * 1000 * i) / SR) * (1 - i / 256);
        }
    }
    return out;
}

describe("trackBeats", () => {
    it("finds one event per click", () => {
        const beats = trackBeats(clickTrack(), SR);
        expect(beats).toHaveLength(CLICKS_SEC.length);
        beats.forEach((pos, i) => {
            expect(Number.isInteger(pos)).toBe(true);
            expect(Math.abs(pos - (CLICKS_SEC[i] ?? 0) * SR)).toBeLessThan(0.05 * SR);
        });
    });

    it("returns nothing for silence or input shorter than one window", () => {
        expect(trackBeats(new Float32Array(SR), SR)).toEqual([]);
        expect(trackBeats(new Float32Array(512), SR)).toEqual([]);
    });

    it("drives event segmentation of a sound", async () => {
        const samples = clickTrack();
        const beats = trackBeats(samples, SR);
        const rows = await analyzeSound("/sounds/clicks.wav", "clicks", {
            frameSize: 8192,
            syncWithBeats: true,
            extractor: meanExtractor(),
            loadAudio: async () => samples,
        });
        expect(rows.map((r) => r.frame.startSample)).toEqual(beats.slice(0, -1));
        expect(rows.map((r) => r.frame.endSample)).toEqual(beats.slice(1));
    });
});
