/** All audio is analysed and reconstructed at this rate. */
export const MOSAIC_SAMPLE_RATE = 44100;

/** Number of cepstral coefficients in every feature vector. */
export const MFCC_COEFFS = 13;

export const MFCC_FEATURES = [
    "mfcc_0",
    "mfcc_1",
    "mfcc_2",
    "mfcc_3",
    "mfcc_4",
    "mfcc_5",
    "mfcc_6",
    "mfcc_7",
    "mfcc_8",
    "mfcc_9",
    "mfcc_10",
    "mfcc_11",
    "mfcc_12",
] as const;

/**
 * The fixed feature schema shared by every frame of every table.
 *
 * Order matters: it is the column order of persisted tables.
 */
export const FEATURE_NAMES = [
    "loudness",
    ...MFCC_FEATURES,
    "spectral_centroid",
    "danceability",
    "flux",
    "hfc",
    "spectral_complexity",
    "pitch_salience",
    "intensity",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/** Default similarity columns (cepstrum first, then the scalar descriptors). */
export const DEFAULT_SIMILARITY_FEATURES: readonly FeatureName[] = [
    ...MFCC_FEATURES,
    "loudness",
    "spectral_centroid",
    "danceability",
    "flux",
    "hfc",
    "spectral_complexity",
    "pitch_salience",
    "intensity",
];

const SCHEMA: readonly string[] = FEATURE_NAMES;

export function isFeatureName(name: string): name is FeatureName {
    return SCHEMA.includes(name);
}

/**
 * One contiguous span of samples from one audio file.
 *
 * Frames are created by the segmenter and never mutated afterwards.
 */
export type Frame = {
    /** Parent recording: a catalog id for source sounds, the file path for a target. */
    readonly collectionId: string;
    /** 0-based position within the parent recording. */
    readonly frameIndex: number;
    readonly sourcePath: string;
    /** Inclusive. */
    readonly startSample: number;
    /** Exclusive. */
    readonly endSample: number;
};

/** Ordered feature name -> value mapping over the full schema. */
export type FeatureVector = Readonly<Record<FeatureName, number>>;

export type FeatureRow = {
    readonly frame: Frame;
    readonly features: FeatureVector;
};

/** Sample boundaries of one frame, before metadata is attached. */
export type FrameBounds = {
    start: number;
    end: number;
};

export type SegmentationMode =
    | { kind: "fixed"; frameSize: number }
    /** Ascending event positions in samples (e.g. beats). */
    | { kind: "events"; positions: readonly number[] };

export type SelectionPolicy =
    | { kind: "best" }
    | { kind: "randomAmongTopK"; k: number };

export type MatchCandidate = {
    frame: Frame;
    /** Row index in the searched table. */
    row: number;
    distance: number;
};

export type MatchDecision = {
    chosen: Frame;
    /** Ascending distance; ties keep table order. */
    candidates: MatchCandidate[];
};

export type ReconstructedAudio = {
    sampleRate: number;
    samples: Float32Array;
    /** `collectionId` of the frame chosen for each target frame, in target order. */
    provenance: string[];
};

export function frameLength(frame: Pick<Frame, "startSample" | "endSample">): number {
    return frame.endSample - frame.startSample;
}

/** Persisted frame identifier: `{collectionId}_f{frameIndex}`. */
export function frameId(frame: Pick<Frame, "collectionId" | "frameIndex">): string {
    return `${frame.collectionId}_f${frame.frameIndex}`;
}
