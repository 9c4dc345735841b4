import { ERROR_PREFIX } from "../errors";
import { meanStd } from "../util/stats";

export type PeakPickEvent = {
    time: number;
    strength: number;
    index: number;
};

export type PeakPickOptions = {
    /** Threshold is mean(values) + factor * std(values). */
    adaptiveFactor?: number;
    /** Minimum inter-peak interval (seconds); the stronger peak wins. */
    minIntervalSec?: number;
};

/**
 * Local maxima at or above an adaptive threshold. Every frame of a plateau
 * counts as a maximum; `minIntervalSec` keeps the first of them.
 */
export function peakPick(
    times: Float32Array,
    values: Float32Array,
    options: PeakPickOptions = {}
): PeakPickEvent[] {
    if (times.length !== values.length) {
        throw new Error(`${ERROR_PREFIX}: peakPick times/values length mismatch`);
    }

    const n = values.length;
    if (n === 0) return [];

    const { mean, std } = meanStd(values);
    const thr = mean + (options.adaptiveFactor ?? 0) * std;

    const minIntervalSec = options.minIntervalSec ?? 0;
    const out: PeakPickEvent[] = [];
    let lastPeakTime = -Infinity;

    for (let i = 1; i < n - 1; i++) {
        const v = values[i] ?? 0;
        if (!(v >= thr)) continue;

        const prev = values[i - 1] ?? 0;
        const next = values[i + 1] ?? 0;
        if (v < prev || v < next) continue;

        const t = times[i] ?? 0;
        if (t - lastPeakTime < minIntervalSec) {
            const last = out[out.length - 1];
            if (last && v > last.strength) {
                last.time = t;
                last.strength = v;
                last.index = i;
                lastPeakTime = t;
            }
            continue;
        }

        out.push({ time: t, strength: v, index: i });
        lastPeakTime = t;
    }

    return out;
}
