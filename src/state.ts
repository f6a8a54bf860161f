/** ============================
 * Run state and its reducers
 *
 * Building a run, restarting it, the actor's actions and the frame tick.
 * Clock readings and seeds arrive as arguments.
 * ============================ */
import { createActor, jump, shoot, slide, updateActor } from "./actor";
import { DEFAULT_WEIGHTS, moveObstacles } from "./obstacles";
import { emptyPool, updateParticles } from "./particles";
import { createProjectile, moveProjectiles } from "./projectiles";
import { createRun, resolve, updatePopups } from "./scoring";
import { createSpawner, reseedSpawner, trySpawn } from "./spawner";
import type { State, Weights } from "./types";
import { rand, toSeed } from "./util";

/** Particles draw from their own stream, derived from the run seed */
const particleSeed = (seed: number): number => rand(toSeed(seed) ^ 0x5bd1e995).seed;

export const createState = (
    now = 0,
    seed = 123456789,
    highScore = 0,
    weights: Weights = DEFAULT_WEIGHTS,
): State => ({
    actor: createActor(),
    obstacles: [],
    projectiles: [],
    particles: emptyPool(particleSeed(seed)),
    spawner: createSpawner(toSeed(seed), now, weights),
    run: createRun(highScore),
    popups: [],
    gameOver: false,
    paused: false,
    tickCount: 0,
    nextId: 1,
});

/** A fresh run with the default seed */
export const initialState: State = createState();

/**
 * Reset the whole run in one step. The high score survives (and takes the
 * finished run into account); the spawner is reseeded with its history
 * cleared so a restart cannot be used to replay a known sequence.
 */
export const restartGame = (s: State, now: number, seed: number): State => ({
    ...createState(
        now,
        seed,
        Math.max(s.run.highScore, s.run.score),
        s.spawner.weights,
    ),
    spawner: reseedSpawner(s.spawner, toSeed(seed), now),
});

/** Actor actions are ignored once the run is over or paused */
const playing = (s: State): boolean => !s.gameOver && !s.paused;

export const actorJump = (s: State): State => {
    if (!playing(s)) return s;
    const step = jump(s.actor, s.particles);
    return { ...s, actor: step.actor, particles: step.particles };
};

export const actorSlide = (s: State): State => {
    if (!playing(s)) return s;
    const step = slide(s.actor, s.particles);
    return { ...s, actor: step.actor, particles: step.particles };
};

export const actorShoot = (s: State): State => {
    if (!playing(s)) return s;
    const shot = shoot(s.actor);
    return shot.fired
        ? {
              ...s,
              actor: shot.actor,
              projectiles: [...s.projectiles, createProjectile(shot.actor, s.nextId)],
              nextId: s.nextId + 1,
          }
        : s;
};

export const togglePause = (s: State): State =>
    s.gameOver ? s : { ...s, paused: !s.paused };

/** After game over only the death fall and the effects keep moving */
const settle = (s: State): State => ({
    ...s,
    actor: updateActor(s.actor),
    particles: updateParticles(s.particles),
    popups: updatePopups(s.popups),
    tickCount: s.tickCount + 1,
});

/** One frame: spawn, move everything, resolve contacts, then age the effects */
export const tick =
    (now: number) =>
    (s: State): State => {
        if (s.paused) return s;
        if (s.gameOver) return settle(s);

        const spawned = trySpawn(now)(s);
        const moved: State = {
            ...spawned,
            actor: updateActor(spawned.actor),
            obstacles: moveObstacles(spawned.obstacles),
            projectiles: moveProjectiles(spawned.projectiles),
        };
        const resolved = resolve(moved);
        return {
            ...resolved,
            particles: updateParticles(resolved.particles),
            popups: updatePopups(resolved.popups),
            tickCount: s.tickCount + 1,
        };
    };
