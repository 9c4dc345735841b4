import { analyzeCollection, analyzeTarget, type SkippedFile } from "../analysis/analyzeCollection";
import type { FeatureExtractor } from "../analysis/featureExtractor";
import { assemble } from "../audio/assembler";
import { SegmentCache } from "../audio/segmentCache";
import { writeWav, type AudioLoader } from "../audio/wav";
import { readManifest, type CollectionEntry } from "../collection/manifest";
import type { MosaicConfig } from "../config";
import { errorMessage, InvalidConfigError } from "../errors";
import { createMatcher } from "../search/matcher";
import { createRandom, type RandomSource } from "../search/random";
import type { FeatureTable } from "../table/featureTable";
import { readTable, writeTable } from "../table/persistence";
import { DEFAULT_SIMILARITY_FEATURES, MOSAIC_SAMPLE_RATE } from "../types";
import { silentLogger, type Logger } from "../util/log";

export type MosaicStep = "analyze" | "mosaic" | "all";

export const MOSAIC_STEPS: readonly MosaicStep[] = ["analyze", "mosaic", "all"];

export type RunMosaicDeps = {
    logger?: Logger;
    extractor?: FeatureExtractor;
    /** Replaces file decoding (tests). */
    loadAudio?: AudioLoader;
    random?: RandomSource;
    /** Similarity columns. Defaults to every feature, cepstrum first. */
    features?: readonly string[];
};

export type MosaicReport = {
    step: MosaicStep;
    sourceFrames: number;
    targetFrames: number;
    /** Source files skipped during analysis (empty when analysis did not run). */
    skipped: SkippedFile[];
    outputPath?: string;
    /** Chosen source id per target frame. */
    provenance: string[];
    /** Manifest entries that contributed at least one frame, in manifest order. */
    usedSources: CollectionEntry[];
};

export function defaultOutputPath(targetPath: string): string {
    return `${targetPath}.reconstructed.wav`;
}

/**
 * Run one pipeline step (or all of them).
 *
 * - `analyze`: manifest -> source table, target -> target table, both persisted.
 * - `mosaic`: persisted (or just computed) tables -> reconstructed WAV + provenance.
 */
export async function runMosaic(step: MosaicStep, config: MosaicConfig, deps: RunMosaicDeps = {}): Promise<MosaicReport> {
    const logger = deps.logger ?? silentLogger;
    const sampleRate = deps.extractor?.sampleRate ?? MOSAIC_SAMPLE_RATE;
    const cache = new SegmentCache({ loader: deps.loadAudio, sampleRate, logger: logger.child("cache") });

    let manifest: CollectionEntry[] | undefined;
    let source: FeatureTable | undefined;
    let target: FeatureTable | undefined;
    let skipped: SkippedFile[] = [];

    if (step === "analyze" || step === "all") {
        if (!config.targetPath) {
            throw new InvalidConfigError("a target audio file is required for analysis");
        }

        const analysis = {
            frameSize: config.frameSize,
            extractor: deps.extractor,
            loadAudio: (path: string) => cache.load(path),
            logger: logger.child("analyze"),
        };

        manifest = await readManifest(config.manifestPath);
        logger.info("Analyzing source collection...");
        const collection = await analyzeCollection(manifest, analysis);
        source = collection.table;
        skipped = collection.skipped;
        await writeTable(source, config.sourceTablePath);
        logger.info(`Saved source analysis with ${source.size} entries to ${config.sourceTablePath}`);

        logger.info("Analyzing target audio file...");
        target = await analyzeTarget(config.targetPath, { ...analysis, syncWithBeats: config.syncWithBeats });
        await writeTable(target, config.targetTablePath);
        logger.info(`Saved target analysis with ${target.size} entries to ${config.targetTablePath}`);
    }

    if (step === "analyze") {
        return {
            step,
            sourceFrames: source?.size ?? 0,
            targetFrames: target?.size ?? 0,
            skipped,
            provenance: [],
            usedSources: [],
        };
    }

    source ??= await readTable(config.sourceTablePath, "source");
    target ??= await readTable(config.targetTablePath, "target");

    const targetPath = config.targetPath ?? target.rows()[0]?.frame.sourcePath;
    if (!targetPath) {
        throw new InvalidConfigError("target table is empty and no target audio file was given");
    }
    const outputPath = config.outputPath ?? defaultOutputPath(targetPath);

    logger.info("Performing audio mosaicing...");
    const matcher = createMatcher(source, {
        features: deps.features ?? DEFAULT_SIMILARITY_FEATURES,
        policy: config.policy,
        random: deps.random ?? createRandom(config.seed),
    });
    const totalLength = (await cache.load(targetPath)).length;
    const audio = await assemble(target, (row) => matcher(row.features), cache, {
        totalLength,
        sampleRate,
        logger: logger.child("assemble"),
    });

    await writeWav(outputPath, audio.samples, audio.sampleRate);
    logger.info(`Audio generated and saved in ${outputPath}!`);

    if (!manifest) {
        try {
            manifest = await readManifest(config.manifestPath);
        } catch (err) {
            logger.warn(`Provenance metadata unavailable: ${errorMessage(err)}`);
            manifest = [];
        }
    }
    const used = new Set(audio.provenance);
    const usedSources = manifest.filter((e) => used.has(e.collectionId));
    logger.info(`Source ids used in the reconstruction: ${[...used].join(", ")}`);

    return {
        step,
        sourceFrames: source.size,
        targetFrames: target.size,
        skipped,
        outputPath,
        provenance: audio.provenance,
        usedSources,
    };
}
