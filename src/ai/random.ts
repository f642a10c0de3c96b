/**
 * Source of uniform numbers in [0, 1), same contract as Math.random
 */
export type RandomSource = () => number;

/**
 * Small seedable generator (mulberry32) for reproducible bots
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | null {
    if (items.length === 0) {
        return null;
    }
    const index = Math.min(Math.floor(random() * items.length), items.length - 1);
    return items[index];
}
