/** ============================
 * Collision & Scoring Engine (pure)
 *
 * Runs once per tick after physics:
 * 1. actor vs obstacles: power-ups are collected, hazards are checked
 *    against the actor's state; the first fatal hit ends the run
 * 2. projectiles vs obstacles: both are destroyed, unscored targets pay out
 * 3. passing: obstacles that cleared the actor are scored exactly once
 *
 * Every score change recomputes the difficulty curves from the new total.
 * ============================ */
import { actorHitbox, die } from "./actor";
import { difficultySpeed, milestoneOf, spawnInterval } from "./difficulty";
import { obstacleRect, specOf } from "./obstacles";
import { Bursts, spawnBurst } from "./particles";
import { projectileRect } from "./projectiles";
import {
    Constants,
    type Actor,
    type Obstacle,
    type ParticlePool,
    type Projectile,
    type Rect,
    type RGB,
    type RunState,
    type ScorePopup,
    type State,
    type Vec2,
} from "./types";
import { overlaps } from "./util";

const BONUS_COLOR: RGB = [200, 50, 50];
const COMBO_COLOR: RGB = [200, 200, 50];
const MILESTONE_COLOR: RGB = [255, 220, 0];

const popup = (text: string, at: Vec2, color: RGB): ScorePopup => ({
    text,
    x: at.x,
    y: at.y,
    color,
    life: Constants.POPUP_LIFE,
});

const centreOf = (r: Rect): Vec2 => ({ x: r.x + r.w / 2, y: r.y + r.h / 2 });

export const createRun = (highScore = 0): RunState =>
    withScore(
        {
            score: 0,
            combo: 0,
            highScore,
            startHighScore: highScore,
            speed: 0,
            spawnInterval: 0,
        },
        0,
    );

/** Sets the score and recomputes the difficulty it implies */
export const withScore = (run: RunState, score: number): RunState => ({
    ...run,
    score,
    speed: difficultySpeed(score),
    spawnInterval: spawnInterval(score),
});

type Award = Readonly<{ run: RunState; popups: ScorePopup[] }>;

/**
 * Pass reward for one obstacle. Basic kinds pay a flat amount and break
 * the combo; hard kinds pay more, extend the combo and add floor(combo/2)
 * once the combo reaches 2.
 */
export const award = (run: RunState, o: Obstacle, at: Vec2): Award => {
    const spec = specOf(o);
    if (spec.hazard === "powerUp") return { run, popups: [] };

    const combo = spec.hard ? run.combo + 1 : 0;
    const bonus = combo > 1 ? Math.floor(combo / 2) : 0;
    const score = run.score + spec.passValue + bonus;

    const reached = milestoneOf(score);
    const popups = [
        ...(spec.hard
            ? [popup(`+${spec.passValue} BONUS!`, { x: at.x, y: at.y - 20 }, BONUS_COLOR)]
            : []),
        ...(combo >= 3
            ? [popup(`COMBO x${combo}!`, { x: at.x, y: at.y - 40 }, COMBO_COLOR)]
            : []),
        ...(reached > milestoneOf(run.score)
            ? [
                  popup(
                      `MILESTONE ${reached * Constants.MILESTONE_STEP}!`,
                      { x: at.x, y: at.y - 60 },
                      MILESTONE_COLOR,
                  ),
              ]
            : []),
    ];

    return { run: withScore({ ...run, combo }, score), popups };
};

/** The run has beaten the record it started against */
export const isNewRecord = (run: RunState): boolean => run.score > run.startHighScore;

/** Game over: the record is kept in memory here and persisted by the caller */
export const endRun = (s: State): State => ({
    ...s,
    gameOver: true,
    run: {
        ...s.run,
        highScore: Math.max(s.run.highScore, s.run.score),
    },
});

const grant = (a: Actor, o: Obstacle): Actor => {
    switch (specOf(o).grants) {
        case "doubleJump":
            return { ...a, doubleJumpCharges: a.doubleJumpCharges + 1 };
        case "shot":
            return { ...a, shotCharges: a.shotCharges + 1 };
        default:
            return a;
    }
};

/** Whether touching `o` kills an actor in its current state */
export const isFatal = (a: Actor, o: Obstacle): boolean => {
    switch (specOf(o).hazard) {
        case "powerUp":
            return false;
        case "airborneFatal":
            return !a.onGround;
        case "slideUnder":
            return !a.sliding;
        case "fatal":
            return true;
    }
};

/** Step 1: actor against every live obstacle */
export const resolveCollisions = (s: State): State => {
    if (s.gameOver || s.actor.dead) return s;

    type Acc = Readonly<{
        actor: Actor;
        particles: ParticlePool;
        obstacles: Obstacle[];
        fatal: boolean;
    }>;

    const box = actorHitbox(s.actor);
    const result = s.obstacles.reduce<Acc>(
        (acc, o) => {
            // First fatal hit wins; the rest are left untouched
            if (acc.fatal || !overlaps(box, obstacleRect(o)))
                return { ...acc, obstacles: [...acc.obstacles, o] };

            if (specOf(o).hazard === "powerUp")
                return {
                    ...acc,
                    actor: grant(acc.actor, o),
                    particles: spawnBurst(
                        acc.particles,
                        centreOf(obstacleRect(o)),
                        Bursts.reward,
                    ),
                };

            if (!isFatal(acc.actor, o))
                return { ...acc, obstacles: [...acc.obstacles, o] };

            const dead = die(acc.actor, acc.particles);
            return {
                actor: dead.actor,
                particles: dead.particles,
                obstacles: [...acc.obstacles, o],
                fatal: true,
            };
        },
        { actor: s.actor, particles: s.particles, obstacles: [], fatal: false },
    );

    const next: State = {
        ...s,
        actor: result.actor,
        particles: result.particles,
        obstacles: result.obstacles,
    };
    return result.fatal ? endRun(next) : next;
};

/** Step 2: a projectile and the first obstacle it overlaps destroy each other */
export const resolveProjectiles = (s: State): State => {
    type Acc = Readonly<{
        obstacles: Obstacle[];
        projectiles: Projectile[];
        run: RunState;
        popups: ScorePopup[];
        particles: ParticlePool;
    }>;

    const result = s.projectiles.reduce<Acc>(
        (acc, p) => {
            const shot = projectileRect(p);
            const target = acc.obstacles.find(o => overlaps(shot, obstacleRect(o)));
            if (!target) return { ...acc, projectiles: [...acc.projectiles, p] };

            const obstacles = acc.obstacles.filter(o => o.id !== target.id);
            if (target.scored) return { ...acc, obstacles };

            const at = centreOf(obstacleRect(target));
            const paid = award(acc.run, target, at);
            return {
                ...acc,
                obstacles,
                run: paid.run,
                popups: [...acc.popups, ...paid.popups],
                particles: spawnBurst(acc.particles, at, Bursts.explosion),
            };
        },
        {
            obstacles: s.obstacles,
            projectiles: [],
            run: s.run,
            popups: s.popups,
            particles: s.particles,
        },
    );

    return { ...s, ...result };
};

/** Step 3: score obstacles whose trailing edge is behind the actor */
export const resolvePassing = (s: State): State => {
    const box = actorHitbox(s.actor);
    const at = { x: box.x + box.w / 2, y: box.y };

    type Acc = Readonly<{
        obstacles: Obstacle[];
        run: RunState;
        popups: ScorePopup[];
    }>;

    const result = s.obstacles.reduce<Acc>(
        (acc, o) => {
            if (o.scored || o.x + o.width >= box.x)
                return { ...acc, obstacles: [...acc.obstacles, o] };
            const paid = award(acc.run, o, at);
            return {
                obstacles: [...acc.obstacles, { ...o, scored: true }],
                run: paid.run,
                popups: [...acc.popups, ...paid.popups],
            };
        },
        { obstacles: [], run: s.run, popups: s.popups },
    );

    return { ...s, ...result };
};

/** The full per-tick resolution; a fatal collision stops it */
export const resolve = (s: State): State => {
    if (s.gameOver) return s;
    const afterHits = resolveCollisions(s);
    if (afterHits.gameOver) return afterHits;
    return resolvePassing(resolveProjectiles(afterHits));
};

/** Popups drift up and fade out */
export const updatePopups = (popups: ScorePopup[]): ScorePopup[] =>
    popups
        .map(p => ({ ...p, y: p.y - 1, life: p.life - 1 }))
        .filter(p => p.life > 0);
