/** ============================
 * Projectiles (pure)
 * ============================ */
import { actorHitbox } from "./actor";
import { Constants, Viewport, type Actor, type Projectile, type Rect } from "./types";

/** Fired from the actor's leading edge at mid-height */
export const createProjectile = (a: Actor, id: number): Projectile => {
    const box = actorHitbox(a);
    return {
        id,
        x: box.x + box.w,
        y: box.y + box.h / 2 - Constants.PROJECTILE_HEIGHT / 2,
        speed: Constants.PROJECTILE_SPEED,
    };
};

export const projectileRect = (p: Projectile): Rect => ({
    x: p.x,
    y: p.y,
    w: Constants.PROJECTILE_WIDTH,
    h: Constants.PROJECTILE_HEIGHT,
});

export const moveProjectiles = (projectiles: Projectile[]): Projectile[] =>
    projectiles
        .map(p => ({ ...p, x: p.x + p.speed }))
        .filter(p => p.x <= Viewport.CANVAS_WIDTH);
