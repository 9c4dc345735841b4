/** Arithmetic mean; 0 for an empty array. */
export function mean(values: ArrayLike<number>, from = 0): number {
    const n = values.length - from;
    if (n <= 0) return 0;

    let sum = 0;
    for (let i = from; i < values.length; i++) sum += values[i] ?? 0;
    return sum / n;
}

export function meanStd(values: ArrayLike<number>): { mean: number; std: number } {
    const n = values.length;
    if (n <= 0) return { mean: 0, std: 0 };

    const m = mean(values);
    let varSum = 0;
    for (let i = 0; i < n; i++) {
        const d = (values[i] ?? 0) - m;
        varSum += d * d;
    }

    return { mean: m, std: Math.sqrt(varSum / n) };
}
