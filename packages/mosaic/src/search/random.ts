import seedrandom from "seedrandom";

/** Uniform in [0, 1). */
export type RandomSource = () => number;

/** Seeded sources repeat their sequence; unseeded ones are auto-seeded. */
export function createRandom(seed?: string): RandomSource {
    const prng = seed === undefined ? seedrandom() : seedrandom(seed);
    return () => prng();
}

/** Uniform integer in [0, n). */
export function randomIndex(random: RandomSource, n: number): number {
    const i = Math.floor(random() * n);
    return Math.min(n - 1, Math.max(0, i));
}
