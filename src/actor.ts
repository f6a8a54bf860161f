/** ============================
 * Actor State Machine (pure)
 *
 * idle → run ⇄ jump → fall → run, run ⇄ slide, any → dead.
 * Actions never fail: under an invalid precondition they return the
 * actor (and pool) unchanged. `dead` is terminal until a restart.
 * ============================ */
import { Bursts, spawnBurst } from "./particles";
import {
    ActorSize,
    Constants,
    Physics,
    Viewport,
    type Actor,
    type AnimState,
    type ParticlePool,
    type Rect,
} from "./types";

/** Result of an action that may emit feedback particles */
export type ActorStep = Readonly<{ actor: Actor; particles: ParticlePool }>;

/** Frames per animation clip; `dead` holds its last frame */
export const FRAME_COUNTS: Readonly<Record<AnimState, number>> = {
    idle: 10,
    run: 8,
    jump: 8,
    fall: 8,
    slide: 10,
    dead: 10,
};

export const createActor = (): Actor => ({
    x: ActorSize.X,
    y: Viewport.GROUND_LEVEL,
    vy: 0,
    onGround: true,
    dead: false,
    anim: "idle",
    frame: 0,
    animTimer: 0,
    freshJump: false,
    sliding: false,
    slideTimer: 0,
    slideCooldown: 0,
    doubleJumpCharges: Constants.INITIAL_DOUBLE_JUMPS,
    shotCharges: Constants.INITIAL_SHOTS,
});

/** Hitbox shrinks while sliding; the bottom edge never moves */
export const actorHitbox = (a: Actor): Rect => {
    const h = a.sliding ? ActorSize.SLIDE_HEIGHT : ActorSize.HEIGHT;
    return { x: a.x, y: a.y - h, w: ActorSize.WIDTH, h };
};

const feet = (a: Actor) => ({ x: a.x + ActorSize.WIDTH / 2, y: a.y });

const centre = (a: Actor) => {
    const box = actorHitbox(a);
    return { x: box.x + box.w / 2, y: box.y + box.h / 2 };
};

/** Switch clip, restarting it only when it actually changes */
const withAnim = (a: Actor, anim: AnimState): Actor =>
    a.anim === anim ? a : { ...a, anim, frame: 0, animTimer: 0 };

export const jump = (a: Actor, particles: ParticlePool): ActorStep => {
    if (a.dead) return { actor: a, particles };

    if (a.onGround) {
        const launched: Actor = {
            ...a,
            vy: Physics.JUMP_FORCE,
            onGround: false,
            freshJump: true,
            sliding: false,
            slideTimer: 0,
            anim: "jump",
            frame: 0,
            animTimer: 0,
        };
        return {
            actor: launched,
            particles: spawnBurst(particles, feet(a), Bursts.jump),
        };
    }

    if (a.doubleJumpCharges > 0) {
        const boosted: Actor = {
            ...a,
            vy: Physics.DOUBLE_JUMP_FORCE,
            freshJump: true,
            doubleJumpCharges: a.doubleJumpCharges - 1,
            anim: "jump",
            frame: 0,
            animTimer: 0,
        };
        return {
            actor: boosted,
            particles: spawnBurst(particles, feet(a), Bursts.doubleJump),
        };
    }

    return { actor: a, particles };
};

export const slide = (a: Actor, particles: ParticlePool): ActorStep => {
    if (a.dead || !a.onGround || a.sliding || a.slideCooldown > 0)
        return { actor: a, particles };

    const crouched: Actor = {
        ...a,
        sliding: true,
        slideTimer: Physics.SLIDE_DURATION,
        slideCooldown: Physics.SLIDE_COOLDOWN,
        anim: "slide",
        frame: 0,
        animTimer: 0,
    };
    return {
        actor: crouched,
        particles: spawnBurst(particles, feet(a), Bursts.dust),
    };
};

/** Spends one shot charge; the caller spawns the projectile when `fired` */
export const shoot = (a: Actor): Readonly<{ actor: Actor; fired: boolean }> =>
    a.dead || a.shotCharges <= 0
        ? { actor: a, fired: false }
        : { actor: { ...a, shotCharges: a.shotCharges - 1 }, fired: true };

export const die = (a: Actor, particles: ParticlePool): ActorStep =>
    a.dead
        ? { actor: a, particles }
        : {
              actor: {
                  ...a,
                  dead: true,
                  vy: Physics.DEATH_BOUNCE,
                  onGround: false,
                  freshJump: false,
                  sliding: false,
                  slideTimer: 0,
                  anim: "dead",
                  frame: 0,
                  animTimer: 0,
              },
              particles: spawnBurst(particles, centre(a), Bursts.impact),
          };

/** Advances the frame counter on the fixed cadence */
export const advanceAnimation = (a: Actor): Actor => {
    const timer = a.animTimer + 1;
    if (timer < Constants.ANIMATION_SPEED) return { ...a, animTimer: timer };
    const count = FRAME_COUNTS[a.anim];
    const frame =
        a.anim === "dead"
            ? Math.min(a.frame + 1, count - 1)
            : (a.frame + 1) % count;
    return { ...a, animTimer: 0, frame };
};

/** Scripted fall: gravity and position only, no ground */
const updateDead = (a: Actor): Actor =>
    advanceAnimation({
        ...a,
        vy: a.vy + Physics.GRAVITY,
        y: a.y + a.vy + Physics.GRAVITY,
    });

const tickSlide = (a: Actor): Actor => {
    const slideCooldown = Math.max(0, a.slideCooldown - 1);
    if (!a.sliding) return { ...a, slideCooldown };
    const slideTimer = Math.max(0, a.slideTimer - 1);
    return slideTimer > 0
        ? { ...a, slideCooldown, slideTimer }
        : { ...a, slideCooldown, slideTimer: 0, sliding: false };
};

export const updateActor = (a: Actor): Actor => {
    if (a.dead) return updateDead(a);

    const afterSlide = tickSlide(a);

    // Gravity is skipped on the tick right after a launch
    const vy =
        afterSlide.onGround || afterSlide.freshJump
            ? afterSlide.vy
            : afterSlide.vy + Physics.GRAVITY;
    const yNext = afterSlide.y + vy;
    const landed = yNext >= Viewport.GROUND_LEVEL;

    const moved: Actor = {
        ...afterSlide,
        freshJump: false,
        vy: landed ? 0 : vy,
        y: landed ? Viewport.GROUND_LEVEL : yNext,
        onGround: landed,
    };

    const anim: AnimState = moved.onGround
        ? moved.sliding
            ? "slide"
            : "run"
        : moved.vy > 0
          ? "fall"
          : "jump";

    return advanceAnimation(withAnim(moved, anim));
};
