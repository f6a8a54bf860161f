/** ============================
 * Obstacle Spawner (pure)
 *
 * Timed creation of one obstacle at a time. Kind selection is weighted,
 * with weights halved for anything in the last HISTORY_SIZE spawns so
 * repeats are rarer but still possible.
 * ============================ */
import { difficultySpeed, spawnInterval } from "./difficulty";
import { DEFAULT_OBSTACLE_KIND, DEFAULT_WEIGHTS, OBSTACLE_SPECS, spawnX } from "./obstacles";
import {
    Constants,
    OBSTACLE_KINDS,
    Physics,
    Viewport,
    type Obstacle,
    type ObstacleKind,
    type SpawnerState,
    type State,
    type Weights,
} from "./types";
import { type Draw, pushBounded, rand, randBetween, randIn, randInt } from "./util";

export const createSpawner = (
    seed: number,
    now = 0,
    weights: Weights = DEFAULT_WEIGHTS,
): SpawnerState => ({
    lastSpawnTime: now,
    history: [],
    seed,
    weights,
});

/**
 * Explicit reseed: clears the anti-repeat memory, restarts the timer and
 * replaces the random stream. Weights are kept.
 */
export const reseedSpawner = (
    sp: SpawnerState,
    seed: number,
    now: number,
): SpawnerState => createSpawner(seed, now, sp.weights);

/** Weights after the anti-repeat penalty */
export const effectiveWeights = (sp: SpawnerState): Weights =>
    OBSTACLE_KINDS.reduce<Weights>(
        (acc, kind) => {
            const base = Math.max(0, Math.floor(sp.weights[kind]));
            const penalised =
                base > 0 && sp.history.includes(kind)
                    ? Math.max(1, Math.floor(base / 2))
                    : base;
            return { ...acc, [kind]: penalised };
        },
        sp.weights,
    );

/** Weighted draw over the given weights; all-zero tables yield the default kind */
export const weightedPick = (seed: number, weights: Weights): Draw<ObstacleKind> => {
    const total = OBSTACLE_KINDS.reduce((sum, k) => sum + weights[k], 0);
    const r = rand(seed);
    if (total <= 0) return { value: DEFAULT_OBSTACLE_KIND, seed: r.seed };
    const target = r.value * total;
    const found = OBSTACLE_KINDS.reduce<{ kind: ObstacleKind | null; acc: number }>(
        (st, kind) => {
            if (st.kind !== null) return st;
            const acc = st.acc + weights[kind];
            return { kind: target < acc ? kind : null, acc };
        },
        { kind: null, acc: 0 },
    );
    return { value: found.kind ?? DEFAULT_OBSTACLE_KIND, seed: r.seed };
};

/** Picks the next kind and records it in the bounded history */
export const pickObstacleKind = (
    sp: SpawnerState,
): Readonly<{ kind: ObstacleKind; spawner: SpawnerState }> => {
    const pick = weightedPick(sp.seed, effectiveWeights(sp));
    return {
        kind: pick.value,
        spawner: {
            ...sp,
            seed: pick.seed,
            history: pushBounded(sp.history, pick.value, Constants.HISTORY_SIZE),
        },
    };
};

/** Builds an obstacle at the right edge: scale, placement band and jittered speed */
export const createObstacle = (
    kind: ObstacleKind,
    id: number,
    baseSpeed: number,
    seed: number,
): Readonly<{ obstacle: Obstacle; seed: number }> => {
    const spec = OBSTACLE_SPECS[kind];
    const scale = randIn(seed, spec.scale);
    const lift =
        spec.anchor === "ground"
            ? { value: 0, seed: scale.seed }
            : randInt(scale.seed, spec.lift[0], spec.lift[1]);
    const jitter = randBetween(lift.seed, -Physics.SPEED_JITTER, Physics.SPEED_JITTER);
    const variant = randInt(jitter.seed, 0, 0xffff);
    return {
        obstacle: {
            id,
            kind,
            x: spawnX(),
            y: Viewport.GROUND_LEVEL - lift.value,
            width: Math.floor(spec.width * scale.value),
            height: Math.floor(spec.height * scale.value),
            speed: baseSpeed + jitter.value,
            scored: false,
            variant: variant.value,
            paletteIndex: 0,
            paletteTimer: 0,
        },
        seed: variant.seed,
    };
};

/** Spawns exactly one obstacle once the score-dependent interval has elapsed */
export const trySpawn =
    (now: number) =>
    (s: State): State => {
        if (now - s.spawner.lastSpawnTime <= spawnInterval(s.run.score)) return s;
        const pick = pickObstacleKind(s.spawner);
        const made = createObstacle(
            pick.kind,
            s.nextId,
            difficultySpeed(s.run.score),
            pick.spawner.seed,
        );
        return {
            ...s,
            obstacles: [...s.obstacles, made.obstacle],
            nextId: s.nextId + 1,
            spawner: { ...pick.spawner, seed: made.seed, lastSpawnTime: now },
        };
    };
