export type MosaicVersion = "0.1.0";

export const MOSAIC_VERSION: MosaicVersion = "0.1.0";

// ----------------------------
// Core types
// ----------------------------

export type {
  FeatureName,
  FeatureRow,
  FeatureVector,
  Frame,
  FrameBounds,
  MatchCandidate,
  MatchDecision,
  ReconstructedAudio,
  SegmentationMode,
  SelectionPolicy
} from "./types";
export {
  DEFAULT_SIMILARITY_FEATURES,
  FEATURE_NAMES,
  MFCC_COEFFS,
  MOSAIC_SAMPLE_RATE,
  frameId,
  frameLength,
  isFeatureName
} from "./types";

export type { MosaicErrorCode } from "./errors";
export {
  AnalysisError,
  InvalidConfigError,
  InvalidQueryError,
  MosaicError,
  TablePersistenceError
} from "./errors";

// ----------------------------
// Segmentation + features
// ----------------------------

export { evenFrameSize, segment, segmentByEvents, segmentFixed, toFrames } from "./analysis/segmenter";

export type { FeatureExtractor, FeatureExtractorOptions, FrameDescriptors } from "./analysis/featureExtractor";
export { createFeatureExtractor } from "./analysis/featureExtractor";
export { buildFeatureVector, makeFeatureVector } from "./analysis/featureVector";

export type { AnalysisOptions, CollectionAnalysis, SkippedFile } from "./analysis/analyzeCollection";
export { analyzeCollection, analyzeSound, analyzeTarget } from "./analysis/analyzeCollection";

// ----------------------------
// DSP
// ----------------------------

export type { AudioBufferLike, Spectrogram, SpectrogramConfig } from "./dsp/spectrogram";
export { mixToMono, monoAudio, spectrogram } from "./dsp/spectrogram";
export type { MelConfig, MelSpectrogram } from "./dsp/mel";
export { hzToMel, melSpectrogram, melToHz } from "./dsp/mel";
export type { MfccOptions, MfccResult } from "./dsp/mfcc";
export { meanCoeffs, mfcc } from "./dsp/mfcc";
export { highFrequencyContent, pitchSalience, spectralCentroid, spectralComplexity, spectralFlux } from "./dsp/spectral";
export type { IntensityClass } from "./dsp/dynamics";
export { danceability, intensity, loudness, rmsDb } from "./dsp/dynamics";
export type { OnsetEnvelope } from "./dsp/onset";
export { onsetEnvelopeFromSpectrogram } from "./dsp/onset";
export type { PeakPickEvent, PeakPickOptions } from "./dsp/peakPick";
export { peakPick } from "./dsp/peakPick";
export type { BeatTrackerOptions } from "./dsp/beats";
export { trackBeats } from "./dsp/beats";

// ----------------------------
// Tables
// ----------------------------

export type { FeatureMatrix } from "./table/featureTable";
export { FeatureTable, projectVector, resolveFeatures } from "./table/featureTable";
export { parseTable, readTable, serializeTable, TABLE_COLUMNS, writeTable } from "./table/persistence";

export type { CollectionEntry } from "./collection/manifest";
export { parseManifest, readManifest } from "./collection/manifest";

// ----------------------------
// Similarity search
// ----------------------------

export type { MatchOptions, Matcher } from "./search/matcher";
export { createMatcher, euclideanDistance, findNearest, match, selectCandidate } from "./search/matcher";
export type { RandomSource } from "./search/random";
export { createRandom } from "./search/random";

// ----------------------------
// Audio I/O + reconstruction
// ----------------------------

export type { AudioLoader, DecodedAudio } from "./audio/wav";
export { decodeWav, encodeWav, writeWav } from "./audio/wav";
export { decodeAudio, loadMonoAudio, sniffContainer, toMono } from "./audio/load";
export type { AudioContainer } from "./audio/load";
export { decodeOggVorbis } from "./audio/ogg";
export type { SegmentCacheOptions } from "./audio/segmentCache";
export { SegmentCache, sliceSegment } from "./audio/segmentCache";
export type { AssembleOptions, FrameChooser } from "./audio/assembler";
export { assemble } from "./audio/assembler";

// ----------------------------
// Pipeline, config, logging
// ----------------------------

export type { MosaicReport, MosaicStep, RunMosaicDeps } from "./runner/runMosaic";
export { defaultOutputPath, runMosaic } from "./runner/runMosaic";
export type { ConfigOverrides, MosaicConfig } from "./config";
export { loadConfig, loadDotenv } from "./config";
export type { Logger, LogLevel, LogSink } from "./util/log";
export { createLogger, silentLogger } from "./util/log";
