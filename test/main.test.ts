import { describe, it, expect } from "vitest";
import {
    Bursts,
    Constants,
    Physics,
    Viewport,
    actorJump,
    actorShoot,
    actorSlide,
    createActor,
    createState,
    difficultySpeed,
    initialState,
    restartGame,
    spawnInterval,
    state$,
    tick,
    togglePause,
    type Obstacle,
    type State,
} from "../src/main";

// Helpers
const mkState = (over: Partial<State> = {}): State => ({
    ...initialState,
    ...over,
});

const mkObstacle = (over: Partial<Obstacle> = {}): Obstacle => ({
    id: 100,
    kind: "stone",
    x: 110,
    y: 500,
    width: 52,
    height: 52,
    speed: 7,
    scored: false,
    variant: 0,
    paletteIndex: 0,
    paletteTimer: 0,
    ...over,
});

/** Ticks at a fixed time, so the spawner stays idle */
const ticks = (s: State, n: number, now = 0): State =>
    Array.from({ length: n }).reduce<State>(acc => tick(now)(acc), s);

describe("state$ smoke", () => {
    it("is exported and is a function", () => {
        expect(state$).toBeTypeOf("function");
    });
});

describe("scenario: fatal contact", () => {
    it("kills on the next tick without changing the score", () => {
        const s1 = tick(0)(mkState({ obstacles: [mkObstacle()] }));
        expect(s1.actor.dead).toBe(true);
        expect(s1.gameOver).toBe(true);
        expect(s1.run.score).toBe(0);
        expect(s1.particles.items.length).toBe(Bursts.impact.count);
    });
});

describe("scenario: balloon", () => {
    it("kills an actor that jumps into it", () => {
        // After jump + one tick the actor spans y 410..480
        const balloon = mkObstacle({ kind: "balloon", x: 107, y: 470, width: 48, height: 84 });
        const s0 = actorJump(mkState({ obstacles: [balloon] }));
        const s1 = tick(0)(s0);
        expect(s1.actor.onGround).toBe(false);
        expect(s1.gameOver).toBe(true);
    });

    it("is harmless on the ground and pays 2 once passed", () => {
        const balloon = mkObstacle({ kind: "balloon", x: 100, y: 480, width: 48, height: 84 });
        const s6 = ticks(mkState({ obstacles: [balloon] }), 6);
        expect(s6.gameOver).toBe(false);
        expect(s6.run.score).toBe(0); // right edge at 106
        const s7 = tick(0)(s6);
        expect(s7.run.score).toBe(2); // right edge at 99
        expect(s7.run.combo).toBe(1);
        expect(s7.popups.map(p => p.text)).toEqual(["+2 BONUS!"]);
        expect(ticks(s7, 30).run.score).toBe(2);
    });
});

describe("scenario: double-jump power-up", () => {
    it("adds exactly one charge and removes the pickup", () => {
        const feather = mkObstacle({ kind: "feather", x: 110, y: 480, width: 30, height: 30 });
        const s1 = tick(0)(mkState({ obstacles: [feather] }));
        expect(s1.actor.doubleJumpCharges).toBe(initialState.actor.doubleJumpCharges + 1);
        expect(s1.obstacles).toEqual([]);
        expect(s1.gameOver).toBe(false);
    });
});

describe("tick composition and guards", () => {
    it("tick early-returns when paused", () => {
        const s0 = togglePause(mkState({ tickCount: 5 }));
        expect(s0.paused).toBe(true);
        expect(tick(10_000)(s0)).toBe(s0);
    });

    it("moves, spawns and increments tickCount", () => {
        const s0 = mkState({ obstacles: [mkObstacle({ x: 600 })] });
        const s1 = tick(1501)(s0);
        expect(s1.tickCount).toBe(1);
        expect(s1.obstacles[0].x).toBe(593);
        expect(s1.obstacles.length).toBe(2);
        expect(s1.actor.anim).toBe("run");
    });

    it("culls obstacles that scroll off the left edge", () => {
        const s1 = tick(0)(mkState({ obstacles: [mkObstacle({ x: -50, scored: true })] }));
        expect(s1.obstacles).toEqual([]);
    });

    it("keeps the death fall going after game over but freezes the world", () => {
        const dead = tick(0)(mkState({ obstacles: [mkObstacle()] }));
        const later = ticks(dead, 20, 99_999);
        expect(later.actor.y).toBeGreaterThan(Viewport.GROUND_LEVEL);
        expect(later.obstacles).toEqual(dead.obstacles);
        expect(later.tickCount).toBe(dead.tickCount + 20);
        expect(later.run.score).toBe(0);
    });

    it("keeps difficulty a function of score during a long run", () => {
        let s = createState(0, 31337);
        for (let i = 1; i <= 3000 && !s.gameOver; i++) {
            const prev = s.run.score;
            s = tick(i * Constants.TICK_RATE_MS)(s);
            expect(s.run.score).toBeGreaterThanOrEqual(prev);
            expect(s.run.speed).toBe(difficultySpeed(s.run.score));
            expect(s.run.spawnInterval).toBe(spawnInterval(s.run.score));
        }
    });
});

describe("actions through state", () => {
    it("shoot spends a charge and launches a projectile", () => {
        const s1 = actorShoot(initialState);
        expect(s1.actor.shotCharges).toBe(Constants.INITIAL_SHOTS - 1);
        expect(s1.projectiles.length).toBe(1);
        expect(s1.projectiles[0].id).toBe(initialState.nextId);
        expect(s1.nextId).toBe(initialState.nextId + 1);
    });

    it("shoot without charges changes nothing", () => {
        const s0 = mkState({ actor: { ...createActor(), shotCharges: 0 } });
        expect(actorShoot(s0)).toBe(s0);
    });

    it("ignores actions after game over", () => {
        const over = mkState({ gameOver: true });
        expect(actorJump(over)).toBe(over);
        expect(actorSlide(over)).toBe(over);
        expect(actorShoot(over)).toBe(over);
    });

    it("jump applies the launch velocity", () => {
        expect(actorJump(initialState).actor.vy).toBe(Physics.JUMP_FORCE);
    });
});

describe("restartGame", () => {
    it("resets the run, keeps the record and reseeds the spawner", () => {
        const s0 = mkState({
            obstacles: [mkObstacle()],
            run: { ...initialState.run, score: 12, highScore: 10 },
            gameOver: true,
            tickCount: 99,
            spawner: { ...initialState.spawner, history: ["bat", "bat"], lastSpawnTime: 400 },
        });
        const s1 = restartGame(s0, 7000, 555);
        expect(s1.run.score).toBe(0);
        expect(s1.run.highScore).toBe(12);
        expect(s1.obstacles).toEqual([]);
        expect(s1.tickCount).toBe(0);
        expect(s1.gameOver).toBe(false);
        expect(s1.actor).toEqual(createActor());
        expect(s1.spawner.history).toEqual([]);
        expect(s1.spawner.lastSpawnTime).toBe(7000);
        expect(s1.spawner.seed).toBe(555);
        expect(s1.spawner.weights).toBe(s0.spawner.weights);
    });
});
