// src/lib/utils/random.ts
// Seeded uniform generator (mulberry32). Each call to createRng owns its
// own state, so concurrent simulations never share a stream.

export type Rng = () => number;

/** Returns a generator of uniforms in [0, 1) fully determined by `seed` */
export function createRng(seed: number): Rng {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Fresh 32-bit seed for runs that did not supply one */
export function randomSeed(): number {
    return Math.floor(Math.random() * 0x1_0000_0000) >>> 0;
}
