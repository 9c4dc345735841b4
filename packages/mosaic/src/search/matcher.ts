import { InvalidQueryError } from "../errors";
import { projectVector, type FeatureTable } from "../table/featureTable";
import type { FeatureVector, MatchCandidate, MatchDecision, SelectionPolicy } from "../types";

import { createRandom, randomIndex, type RandomSource } from "./random";

export type MatchOptions = {
    /** Feature columns compared; order is irrelevant to the result but must be valid. */
    features: readonly string[];
    policy: SelectionPolicy;
    /** Used by `randomAmongTopK`. Defaults to an auto-seeded source. */
    random?: RandomSource;
    /**
     * Length of the ranked candidate list for `best`. Defaults to 1.
     * `randomAmongTopK` always ranks its own `k`.
     */
    candidates?: number;
};

export type Matcher = (query: FeatureVector) => MatchDecision;

function euclidean(query: Float64Array, data: Float64Array, offset: number): number {
    let sum = 0;
    for (let c = 0; c < query.length; c++) {
        const d = (query[c] ?? 0) - (data[offset + c] ?? 0);
        sum += d * d;
    }
    return Math.sqrt(sum);
}

export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
    if (a.length !== b.length) {
        throw new InvalidQueryError(`vector lengths differ (${a.length} vs ${b.length})`);
    }
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const d = (a[i] ?? 0) - (b[i] ?? 0);
        sum += d * d;
    }
    return Math.sqrt(sum);
}

function assertK(k: number, rows: number): void {
    if (!Number.isInteger(k) || k <= 0) {
        throw new InvalidQueryError(`k must be a positive integer, got ${k}`);
    }
    if (k > rows) {
        throw new InvalidQueryError(`k (${k}) exceeds the number of candidate rows (${rows})`);
    }
}

function policyK(options: MatchOptions): number {
    return options.policy.kind === "randomAmongTopK" ? options.policy.k : options.candidates ?? 1;
}

// Keeps `best` sorted by (distance, row); equal distances keep the earlier row first.
function insertRanked(best: { row: number; distance: number }[], k: number, row: number, distance: number): void {
    if (best.length === k) {
        const worst = best[k - 1];
        if (!worst || distance >= worst.distance) return;
        best.pop();
    }
    let i = best.length;
    while (i > 0 && (best[i - 1]?.distance ?? -Infinity) > distance) i--;
    best.splice(i, 0, { row, distance });
}

/**
 * Build a matcher against a fixed table. The candidate matrix is projected once
 * and reused by every query.
 *
 * @throws InvalidQueryError for an empty or unknown feature list, or an invalid `k`.
 */
export function createMatcher(table: FeatureTable, options: MatchOptions): Matcher {
    const matrix = table.select(options.features);
    const k = policyK(options);
    assertK(k, matrix.rows);

    const random = options.random ?? createRandom();

    return (query) => {
        const q = projectVector(query, matrix.columns);

        const ranked: { row: number; distance: number }[] = [];
        for (let r = 0; r < matrix.rows; r++) {
            insertRanked(ranked, k, r, euclidean(q, matrix.data, r * matrix.cols));
        }

        const candidates: MatchCandidate[] = ranked.map(({ row, distance }) => ({
            frame: table.row(row).frame,
            row,
            distance,
        }));

        return { chosen: selectCandidate(candidates, options.policy, random).frame, candidates };
    };
}

/** Ranked k nearest rows of `table` to `query` over `features`. */
export function findNearest(
    query: FeatureVector,
    table: FeatureTable,
    k: number,
    features: readonly string[]
): MatchCandidate[] {
    return createMatcher(table, { features, policy: { kind: "best" }, candidates: k })(query).candidates;
}

export function selectCandidate(
    candidates: readonly MatchCandidate[],
    policy: SelectionPolicy,
    random: RandomSource
): MatchCandidate {
    const first = candidates[0];
    if (!first) {
        throw new InvalidQueryError("no candidates to choose from");
    }
    switch (policy.kind) {
        case "best":
            return first;
        case "randomAmongTopK":
            return candidates[randomIndex(random, candidates.length)] ?? first;
    }
}

/** One-off match. Prefer `createMatcher` for many queries against the same table. */
export function match(query: FeatureVector, table: FeatureTable, options: MatchOptions): MatchDecision {
    return createMatcher(table, options)(query);
}
