import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { decodeWav, writeWav } from "../src/audio/wav";
import { loadConfig, type MosaicConfig } from "../src/config";
import { InvalidConfigError } from "../src/errors";
import { defaultOutputPath, runMosaic, type RunMosaicDeps } from "../src/runner/runMosaic";
import { readTable } from "../src/table/persistence";

import { concat, constant, meanExtractor, memoryLoader } from "./helpers";

describe("runMosaic", () => {
    let dir = "";
    let config: MosaicConfig;
    let deps: RunMosaicDeps;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "mosaic-run-"));
        const low = join(dir, "low.wav");
        const high = join(dir, "high.wav");
        const target = join(dir, "target.wav");

        await writeFile(
            join(dir, "sounds.csv"),
            [
                "collection_id,path,license",
                `low,${low},CC0`,
                `gone,${join(dir, "gone.wav")},CC0`,
                `high,${high},CC-BY`,
            ].join("\n")
        );

        config = loadConfig(
            {},
            {
                frameSize: 4,
                policy: "best",
                manifestPath: join(dir, "sounds.csv"),
                sourceTablePath: join(dir, "source.csv"),
                targetTablePath: join(dir, "target.csv"),
                targetPath: target,
            }
        );
        deps = {
            extractor: meanExtractor(),
            loadAudio: memoryLoader(
                new Map([
                    [low, constant(12, 0.125)],
                    [high, constant(12, 0.5)],
                    // two full frames and a 4-sample tail
                    [target, concat(constant(4, 0.125), constant(4, 0.5), constant(4, 0.25))],
                ])
            ),
        };
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("analyses, matches and writes the reconstruction", async () => {
        const report = await runMosaic("all", config, deps);

        expect(report.sourceFrames).toBe(4);
        expect(report.targetFrames).toBe(2);
        expect(report.skipped.map((s) => s.collectionId)).toEqual(["gone"]);
        expect(report.provenance).toEqual(["low", "high"]);
        expect(report.usedSources.map((e) => [e.collectionId, e.metadata.license])).toEqual([
            ["low", "CC0"],
            ["high", "CC-BY"],
        ]);

        const outputPath = defaultOutputPath(join(dir, "target.wav"));
        expect(report.outputPath).toBe(outputPath);

        const decoded = decodeWav(await readFile(outputPath));
        const out = decoded.channels[0] ?? new Float32Array(0);
        expect(out.length).toBe(12);
        [0.125, 0.125, 0.125, 0.125, 0.5, 0.5, 0.5, 0.5, 0, 0, 0, 0].forEach((v, i) => expect(out[i]).toBeCloseTo(v, 3));
    });

    it("persists both tables during analysis", async () => {
        const report = await runMosaic("analyze", config, deps);
        expect(report.outputPath).toBeUndefined();

        const source = await readTable(config.sourceTablePath);
        const target = await readTable(config.targetTablePath);
        expect(source.frames().map((f) => f.collectionId)).toEqual(["low", "low", "high", "high"]);
        expect(target.size).toBe(2);
    });

    it("mosaics from persisted tables with the random policy", async () => {
        await runMosaic("analyze", config, deps);

        const random = { ...config, policy: { kind: "randomAmongTopK", k: 2 } as const, seed: "test-seed" };
        const report = await runMosaic("mosaic", random, deps);
        // the two nearest frames of each target frame come from the same source
        expect(report.provenance).toEqual(["low", "high"]);
        expect(report.skipped).toEqual([]);
        expect(report.usedSources.map((e) => e.collectionId)).toEqual(["low", "high"]);
    });

    it("decodes files at the extractor's sample rate", async () => {
        await writeWav(join(dir, "low.wav"), constant(12, 0.125), 22050);
        await writeWav(join(dir, "high.wav"), constant(12, 0.5), 22050);
        await writeWav(join(dir, "target.wav"), concat(constant(4, 0.125), constant(4, 0.5), constant(4, 0.25)), 22050);

        const report = await runMosaic("all", config, { extractor: meanExtractor(22050) });

        // no resampling: 12 samples in, 2 target frames, 12 samples out
        expect(report.sourceFrames).toBe(4);
        expect(report.targetFrames).toBe(2);
        expect(report.provenance).toEqual(["low", "high"]);
        const decoded = decodeWav(await readFile(defaultOutputPath(join(dir, "target.wav"))));
        expect(decoded.sampleRate).toBe(22050);
        expect(decoded.channels[0]?.length).toBe(12);
    });

    it("requires a target for analysis", async () => {
        await expect(runMosaic("analyze", { ...config, targetPath: undefined }, deps)).rejects.toThrow(InvalidConfigError);
    });
});
