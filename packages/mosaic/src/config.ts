import { config as loadEnvFile } from "dotenv";
import { z } from "zod";

import { InvalidConfigError } from "./errors";
import type { SelectionPolicy } from "./types";
import type { LogLevel } from "./util/log";

const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Environment variables understood by the pipeline.
 *
 * Empty strings are treated as unset.
 */
const envSchema = z.object({
    MOSAIC_FRAME_SIZE: z.coerce.number().int().positive().default(8192),
    MOSAIC_NEIGHBOURS: z.coerce.number().int().positive().default(10),
    MOSAIC_POLICY: z.enum(["best", "random"]).default("random"),
    MOSAIC_SEED: z.string().min(1).optional(),
    MOSAIC_MANIFEST: z.string().min(1).default("dataframe.csv"),
    MOSAIC_SOURCE_TABLE: z.string().min(1).default("dataframe_source.csv"),
    MOSAIC_TARGET_TABLE: z.string().min(1).default("dataframe_target.csv"),
    MOSAIC_TARGET: z.string().min(1).optional(),
    MOSAIC_OUTPUT: z.string().min(1).optional(),
    MOSAIC_BEATS: z
        .enum(["true", "false", "1", "0"])
        .transform((v) => v === "true" || v === "1")
        .default("false"),
    MOSAIC_LOG_LEVEL: logLevelSchema.default("info"),
});

export type MosaicConfig = {
    frameSize: number;
    /** Beat-synced target segmentation instead of fixed-size frames. */
    syncWithBeats: boolean;
    policy: SelectionPolicy;
    seed?: string;
    manifestPath: string;
    sourceTablePath: string;
    targetTablePath: string;
    targetPath?: string;
    /** Defaults to `<target>.reconstructed.wav`. */
    outputPath?: string;
    logLevel: LogLevel;
};

export type ConfigOverrides = Partial<Omit<MosaicConfig, "policy">> & {
    policy?: "best" | "random";
    neighbours?: number;
};

function emptyAsUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value !== "") out[key] = value;
    }
    return out;
}

function makePolicy(kind: "best" | "random", neighbours: number): SelectionPolicy {
    return kind === "best" ? { kind: "best" } : { kind: "randomAmongTopK", k: neighbours };
}

/**
 * Resolve configuration from (in order of precedence) explicit overrides,
 * environment variables and defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): MosaicConfig {
    const parsed = envSchema.safeParse(emptyAsUndefined(env));
    if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new InvalidConfigError(`invalid environment (${detail})`, { cause: parsed.error });
    }
    const e = parsed.data;

    const neighbours = overrides.neighbours ?? e.MOSAIC_NEIGHBOURS;
    if (!Number.isInteger(neighbours) || neighbours <= 0) {
        throw new InvalidConfigError(`neighbours must be a positive integer, got ${neighbours}`);
    }
    const frameSize = overrides.frameSize ?? e.MOSAIC_FRAME_SIZE;
    if (!Number.isInteger(frameSize) || frameSize <= 0) {
        throw new InvalidConfigError(`frameSize must be a positive integer, got ${frameSize}`);
    }

    return {
        frameSize,
        syncWithBeats: overrides.syncWithBeats ?? e.MOSAIC_BEATS,
        policy: makePolicy(overrides.policy ?? e.MOSAIC_POLICY, neighbours),
        seed: overrides.seed ?? e.MOSAIC_SEED,
        manifestPath: overrides.manifestPath ?? e.MOSAIC_MANIFEST,
        sourceTablePath: overrides.sourceTablePath ?? e.MOSAIC_SOURCE_TABLE,
        targetTablePath: overrides.targetTablePath ?? e.MOSAIC_TARGET_TABLE,
        targetPath: overrides.targetPath ?? e.MOSAIC_TARGET,
        outputPath: overrides.outputPath ?? e.MOSAIC_OUTPUT,
        logLevel: overrides.logLevel ?? e.MOSAIC_LOG_LEVEL,
    };
}

/** Load `.env` (if present) into `process.env`. Existing variables win. */
export function loadDotenv(path?: string): void {
    loadEnvFile(path ? { path } : undefined);
}
