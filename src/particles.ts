/** ============================
 * Particle Effect Pool (pure)
 *
 * Short-lived feedback particles. The pool carries its own seed so bursts
 * are reproducible and independent of obstacle spawning.
 * ============================ */
import { Physics, type Particle, type ParticlePool, type Range, type Vec2 } from "./types";
import { clamp, randIn, randIntIn } from "./util";

export type Burst = Readonly<{
    count: number;
    color: readonly [r: Range, g: Range, b: Range];
    speedX: Range;
    speedY: Range;
    size: Range;
    lifetime: Range; // ticks, inclusive
}>;

export const Bursts = {
    // Light tan spray kicked up at take-off
    jump: {
        count: 15,
        color: [[200, 230], [200, 230], [180, 220]],
        speedX: [-2, 2],
        speedY: [-3, -1],
        size: [2, 5],
        lifetime: [20, 40],
    },
    doubleJump: {
        count: 20,
        color: [[150, 200], [200, 240], [230, 255]],
        speedX: [-3, 3],
        speedY: [0, 3],
        size: [2, 4],
        lifetime: [15, 30],
    },
    dust: {
        count: 10,
        color: [[140, 170], [110, 130], [70, 90]],
        speedX: [-3, -1],
        speedY: [-1.5, 0],
        size: [2, 4],
        lifetime: [10, 25],
    },
    impact: {
        count: 30,
        color: [[200, 255], [50, 150], [50, 100]],
        speedX: [-3, 3],
        speedY: [-5, 1],
        size: [3, 7],
        lifetime: [30, 60],
    },
    reward: {
        count: 18,
        color: [[230, 255], [200, 240], [40, 90]],
        speedX: [-2, 2],
        speedY: [-4, -1],
        size: [2, 5],
        lifetime: [25, 45],
    },
    explosion: {
        count: 24,
        color: [[220, 255], [120, 200], [20, 60]],
        speedX: [-4, 4],
        speedY: [-4, 2],
        size: [3, 6],
        lifetime: [20, 40],
    },
} as const satisfies Record<string, Burst>;

export const emptyPool = (seed: number): ParticlePool => ({ items: [], seed });

/** Adds `count` particles with properties sampled within the burst ranges */
export const spawnBurst = (
    pool: ParticlePool,
    origin: Vec2,
    burst: Burst,
): ParticlePool => {
    const made = Array.from({ length: Math.max(0, burst.count) }).reduce<
        Readonly<{ items: Particle[]; seed: number }>
    >(
        acc => {
            const r = randIntIn(acc.seed, burst.color[0]);
            const g = randIntIn(r.seed, burst.color[1]);
            const b = randIntIn(g.seed, burst.color[2]);
            const vx = randIn(b.seed, burst.speedX);
            const vy = randIn(vx.seed, burst.speedY);
            const size = randIn(vy.seed, burst.size);
            const lifetime = randIntIn(size.seed, burst.lifetime);
            const particle: Particle = {
                x: origin.x,
                y: origin.y,
                vx: vx.value,
                vy: vy.value,
                color: [r.value, g.value, b.value],
                size: size.value,
                age: 0,
                lifetime: lifetime.value,
            };
            return { items: [...acc.items, particle], seed: lifetime.seed };
        },
        { items: [], seed: pool.seed },
    );
    return { items: [...pool.items, ...made.items], seed: made.seed };
};

/** One step: move, fall, age, shrink in the last 30% of life */
export const stepParticle = (p: Particle): Particle => {
    const age = p.age + 1;
    return {
        ...p,
        x: p.x + p.vx,
        y: p.y + p.vy,
        vy: p.vy + Physics.PARTICLE_GRAVITY,
        age,
        size: age > p.lifetime * 0.7 ? Math.max(1, p.size - 0.5) : p.size,
    };
};

export const isExpired = (p: Particle): boolean => p.age >= p.lifetime;

export const updateParticles = (pool: ParticlePool): ParticlePool => ({
    ...pool,
    items: pool.items.map(stepParticle).filter(p => !isExpired(p)),
});

/** Opacity implied by age, 1 when fresh and 0 at end of life */
export const particleAlpha = (p: Particle): number =>
    p.lifetime <= 0 ? 0 : clamp(1 - p.age / p.lifetime, 0, 1);
