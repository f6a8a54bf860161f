/** ============================
 * Constants
 * ============================ */
export const Viewport = {
    CANVAS_WIDTH: 800,
    CANVAS_HEIGHT: 600,
    GROUND_LEVEL: 500,
} as const;

export const ActorSize = {
    X: 100,
    WIDTH: 50,
    HEIGHT: 70,
    SLIDE_HEIGHT: 35,
} as const;

export const Constants = {
    TICK_RATE_MS: 16, // ~60 fps
    ANIMATION_SPEED: 6, // ticks per animation frame
    HISTORY_SIZE: 3,
    PROJECTILE_WIDTH: 12,
    PROJECTILE_HEIGHT: 6,
    PROJECTILE_SPEED: 12,
    POPUP_LIFE: 60,
    PALETTE_SIZE: 5,
    PALETTE_TICKS: 8,
    MILESTONE_STEP: 25,
    INITIAL_SHOTS: 3,
    INITIAL_DOUBLE_JUMPS: 0,
} as const;

export const Physics = {
    GRAVITY: 1,
    JUMP_FORCE: -20,
    DOUBLE_JUMP_FORCE: -18, // 0.9 × JUMP_FORCE
    DEATH_BOUNCE: -8,
    PARTICLE_GRAVITY: 0.1,
    SLIDE_DURATION: 30,
    SLIDE_COOLDOWN: 50,
    SPEED_JITTER: 0.5,
} as const;

export const Difficulty = {
    BASE_SPEED: 7,
    SPEED_STEP: 0.2, // per SPEED_EVERY points
    SPEED_EVERY: 10,
    MAX_SPEED: 15,
    BASE_INTERVAL_MS: 1500,
    INTERVAL_STEP_MS: 50, // per INTERVAL_EVERY points
    INTERVAL_EVERY: 5,
    MIN_INTERVAL_MS: 800,
} as const;

/** ============================
 * Run model
 * ============================ */
export type Vec2 = Readonly<{ x: number; y: number }>;

/** Axis-aligned box, top-left anchored */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export type Range = readonly [min: number, max: number];

export type RGB = readonly [r: number, g: number, b: number];

export type AnimState = "idle" | "run" | "jump" | "fall" | "slide" | "dead";

/** Actor: the runner. `y` is the bottom edge (feet). */
export type Actor = Readonly<{
    x: number;
    y: number;
    vy: number;
    onGround: boolean;
    dead: boolean;
    anim: AnimState;
    frame: number;
    animTimer: number;
    freshJump: boolean; // set by a jump, cleared by the next update
    sliding: boolean;
    slideTimer: number;
    slideCooldown: number;
    doubleJumpCharges: number;
    shotCharges: number;
}>;

export const OBSTACLE_KINDS = [
    "stone",
    "cactus",
    "bush",
    "balloon",
    "bat",
    "feather",
    "ammo",
] as const;

export type ObstacleKind = (typeof OBSTACLE_KINDS)[number];

/**
 * How an obstacle is cleared:
 * - fatal: any contact kills
 * - airborneFatal: kills only while the actor is off the ground
 * - slideUnder: kills unless the actor is sliding
 * - powerUp: contact grants a resource
 */
export type Hazard = "fatal" | "airborneFatal" | "slideUnder" | "powerUp";

export type PowerUp = "doubleJump" | "shot";

export type ObstacleSpec = Readonly<{
    hazard: Hazard;
    anchor: "ground" | "air";
    lift: Range; // px between ground and the obstacle's bottom edge
    width: number;
    height: number;
    scale: Range;
    passValue: number;
    hard: boolean; // counts towards combos
    grants?: PowerUp;
}>;

/** Obstacle: `y` is the bottom edge */
export type Obstacle = Readonly<{
    id: number;
    kind: ObstacleKind;
    x: number;
    y: number;
    width: number;
    height: number;
    speed: number;
    scored: boolean;
    variant: number; // seed for the renderer's sprite choice
    paletteIndex: number;
    paletteTimer: number;
}>;

export type Projectile = Readonly<{
    id: number;
    x: number;
    y: number; // top edge
    speed: number;
}>;

export type Particle = Readonly<{
    x: number;
    y: number;
    vx: number;
    vy: number;
    color: RGB;
    size: number;
    age: number;
    lifetime: number;
}>;

/** Particle pool with its own random stream */
export type ParticlePool = Readonly<{
    items: Particle[];
    seed: number;
}>;

export type Weights = Readonly<Record<ObstacleKind, number>>;

/** Spawner: timer, anti-repeat history (bounded) and random stream */
export type SpawnerState = Readonly<{
    lastSpawnTime: number;
    history: ObstacleKind[];
    seed: number;
    weights: Weights;
}>;

export type RunState = Readonly<{
    score: number;
    combo: number;
    highScore: number;
    /** Record as it stood when the run began */
    startHighScore: number;
    speed: number;
    spawnInterval: number;
}>;

/** Floating score text */
export type ScorePopup = Readonly<{
    text: string;
    x: number;
    y: number;
    color: RGB;
    life: number;
}>;

/** Everything one frame of a run needs */
export type State = Readonly<{
    actor: Actor;
    obstacles: Obstacle[];
    projectiles: Projectile[];
    particles: ParticlePool;
    spawner: SpawnerState;
    run: RunState;
    popups: ScorePopup[];
    gameOver: boolean;
    paused: boolean;
    tickCount: number;
    nextId: number;
}>;

export type InputAction =
    | "jump"
    | "slide"
    | "shoot"
    | "restart"
    | "pause"
    | "mute";
