export type Rng = () => number;

/** 31-bit string hash used to derive RNG seeds from readable keys. */
export function getSeededRandom(seed: string): number {
    let hash = 0;
    for (let i = 0; i < seed.length; i++) {
        const char = seed.charCodeAt(i);
        hash = (hash << 5) - hash + char;
        hash = hash & hash;
    }
    return Math.abs(hash);
}

/** Linear congruential generator yielding values in [0, 1). */
export function createSeededRng(seed: number): Rng {
    let state = seed >>> 0;
    return () => {
        state = (state * 1664525 + 1013904223) >>> 0;
        return state / 4294967296;
    };
}

export function createRngFromKey(seedKey: string): Rng {
    return createSeededRng(getSeededRandom(seedKey));
}

export function shuffleWithRng<T>(items: readonly T[], rng: Rng): T[] {
    const shuffled = [...items];
    for (let i = shuffled.length - 1; i > 0; i -= 1) {
        const j = Math.floor(rng() * (i + 1));
        [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
}

/** Box-Muller sample from N(mean, stdDev). */
export function sampleNormal(rng: Rng, mean: number, stdDev: number): number {
    const u1 = Math.max(rng(), Number.EPSILON);
    const u2 = rng();
    return mean + stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
