/** ============================
 * Pure helpers: seeded RNG, geometry, small collections
 * ============================ */
import type { Range, Rect } from "./types";

/**
 * 31-bit linear congruential generator. `hash` steps a seed to the next
 * one; `scale` maps a seed onto [0, 1).
 */
abstract class RNG {
    private static m = 0x80000000; // 2^31
    private static a = 1103515245;
    private static c = 12345;

    // Math.imul keeps the product exact; masking is mod 2^31
    public static hash = (seed: number): number =>
        (Math.imul(RNG.a, seed) + RNG.c) & (RNG.m - 1);
    public static scale = (hash: number): number => hash / RNG.m; // [0,1)
}

/** Seeded random draw result: the value and the seed for the next draw */
export type Draw<T = number> = Readonly<{ value: T; seed: number }>;

export const rand = (seed: number): Draw => {
    const next = RNG.hash(seed);
    return { value: RNG.scale(next), seed: next };
};

/** Uniform float in [min, max) */
export const randBetween = (seed: number, min: number, max: number): Draw => {
    const r = rand(seed);
    return { value: min + (max - min) * r.value, seed: r.seed };
};

/** Uniform integer in [min, max], both inclusive */
export const randInt = (seed: number, min: number, max: number): Draw => {
    const r = rand(seed);
    return { value: min + Math.floor(r.value * (max - min + 1)), seed: r.seed };
};

export const randIn = (seed: number, [min, max]: Range): Draw =>
    randBetween(seed, min, max);

export const randIntIn = (seed: number, [min, max]: Range): Draw =>
    randInt(seed, min, max);

/** Folds a non-negative 31-bit seed out of any number */
export const toSeed = (n: number): number =>
    Math.abs(Math.trunc(n)) & 0x7fffffff;

export const clamp = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));

/** Strict AABB overlap; touching edges do not count */
export const overlaps = (a: Rect, b: Rect): boolean =>
    a.x < b.x + b.w && a.x + a.w > b.x && a.y < b.y + b.h && a.y + a.h > b.y;

/** Appends to a bounded buffer, dropping the oldest entries */
export const pushBounded = <T>(buf: readonly T[], item: T, size: number): T[] =>
    [...buf, item].slice(Math.max(0, buf.length + 1 - size));
