/** ============================
 * Obstacle catalogue and per-obstacle motion (pure)
 * ============================ */
import {
    Constants,
    OBSTACLE_KINDS,
    Viewport,
    type Obstacle,
    type ObstacleKind,
    type ObstacleSpec,
    type Rect,
    type Weights,
} from "./types";

export const DEFAULT_OBSTACLE_KIND: ObstacleKind = "stone";

/**
 * Lift bands keep the two airborne hazards apart: a bat's bottom edge
 * (448..460) sits below a standing actor's head (430) but above a sliding
 * one's (465); a balloon's bottom edge (360..420) clears a standing actor.
 */
export const OBSTACLE_SPECS: Readonly<Record<ObstacleKind, ObstacleSpec>> = {
    stone: {
        hazard: "fatal",
        anchor: "ground",
        lift: [0, 0],
        width: 52,
        height: 52,
        scale: [0.9, 1.3],
        passValue: 1,
        hard: false,
    },
    cactus: {
        hazard: "fatal",
        anchor: "ground",
        lift: [0, 0],
        width: 40,
        height: 80,
        scale: [0.9, 1.3],
        passValue: 1,
        hard: false,
    },
    bush: {
        hazard: "fatal",
        anchor: "ground",
        lift: [0, 0],
        width: 66,
        height: 42,
        scale: [0.9, 1.3],
        passValue: 1,
        hard: false,
    },
    balloon: {
        hazard: "airborneFatal",
        anchor: "air",
        lift: [80, 140],
        width: 48,
        height: 84,
        scale: [0.9, 1.3],
        passValue: 2,
        hard: true,
    },
    bat: {
        hazard: "slideUnder",
        anchor: "air",
        lift: [40, 52],
        width: 44,
        height: 30,
        scale: [0.9, 1.1],
        passValue: 2,
        hard: true,
    },
    feather: {
        hazard: "powerUp",
        anchor: "air",
        lift: [90, 150],
        width: 30,
        height: 30,
        scale: [1.0, 1.2],
        passValue: 0,
        hard: false,
        grants: "doubleJump",
    },
    ammo: {
        hazard: "powerUp",
        anchor: "air",
        lift: [10, 60],
        width: 28,
        height: 28,
        scale: [1.0, 1.2],
        passValue: 0,
        hard: false,
        grants: "shot",
    },
};

/** Base spawn weights; see parseObstacleTable for overrides */
export const DEFAULT_WEIGHTS: Weights = {
    stone: 28,
    cactus: 26,
    bush: 22,
    balloon: 14,
    bat: 12,
    feather: 5,
    ammo: 5,
};

export const isObstacleKind = (value: string): value is ObstacleKind =>
    (OBSTACLE_KINDS as readonly string[]).includes(value);

/** Unknown names (corrupted config) fall back to the default kind */
export const toObstacleKind = (value: string): ObstacleKind => {
    const name = value.trim().toLowerCase();
    if (isObstacleKind(name)) return name;
    console.warn(
        `Unknown obstacle type "${value}", using "${DEFAULT_OBSTACLE_KIND}"`,
    );
    return DEFAULT_OBSTACLE_KIND;
};

export const specOf = (o: Obstacle): ObstacleSpec => OBSTACLE_SPECS[o.kind];

export const obstacleRect = (o: Obstacle): Rect => ({
    x: o.x,
    y: o.y - o.height,
    w: o.width,
    h: o.height,
});

/** Scroll left; power-ups also cycle their palette */
export const moveObstacle = (o: Obstacle): Obstacle => {
    const x = o.x - o.speed;
    if (specOf(o).hazard !== "powerUp") return { ...o, x };
    const timer = o.paletteTimer + 1;
    return timer >= Constants.PALETTE_TICKS
        ? {
              ...o,
              x,
              paletteTimer: 0,
              paletteIndex: (o.paletteIndex + 1) % Constants.PALETTE_SIZE,
          }
        : { ...o, x, paletteTimer: timer };
};

export const isOffscreen = (o: Obstacle): boolean => o.x + o.width < 0;

export const moveObstacles = (obstacles: Obstacle[]): Obstacle[] =>
    obstacles.map(moveObstacle).filter(o => !isOffscreen(o));

export const spawnX = (): number => Viewport.CANVAS_WIDTH;
