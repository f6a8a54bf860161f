import { describe, it, expect } from "vitest";
import { Subject, from } from "rxjs";
import {
    Physics,
    actionFromKey,
    gameOver$,
    initialState,
    memoryHighScoreStore,
    milestone$,
    persistHighScore,
    state$,
    type InputAction,
    type State,
} from "../src/main";

const withRun = (over: Partial<State["run"]>, extra: Partial<State> = {}): State => ({
    ...initialState,
    ...extra,
    run: { ...initialState.run, ...over },
});

/** Drives state$ by hand: no timers, fixed clock and seed */
const harness = () => {
    const ticks$ = new Subject<void>();
    const input$ = new Subject<InputAction>();
    const seen: State[] = [];
    const sub = state$(input$, {
        ticks$,
        clock: () => 0,
        nextSeed: () => 42,
    }).subscribe(s => seen.push(s));
    const last = (): State => {
        const s = seen[seen.length - 1];
        if (!s) throw new Error("no state emitted yet");
        return s;
    };
    return { ticks$, input$, seen, last, sub };
};

describe("actionFromKey", () => {
    it("maps bound keys", () => {
        expect(actionFromKey({ name: "space" })).toBe("jump");
        expect(actionFromKey({ name: "up" })).toBe("jump");
        expect(actionFromKey({ name: "down" })).toBe("slide");
        expect(actionFromKey({ name: "F" })).toBe("shoot");
        expect(actionFromKey({ name: "r" })).toBe("restart");
        expect(actionFromKey({ name: "p" })).toBe("pause");
        expect(actionFromKey({ sequence: " " })).toBe("jump");
    });

    it("ignores unbound and control keys", () => {
        expect(actionFromKey({ name: "q" })).toBeNull();
        expect(actionFromKey({ name: "c", ctrl: true })).toBeNull();
        expect(actionFromKey({})).toBeNull();
    });
});

describe("state$", () => {
    it("folds ticks and inputs into state", () => {
        const h = harness();
        h.ticks$.next();
        expect(h.last().tickCount).toBe(1);
        h.input$.next("jump");
        expect(h.last().actor.vy).toBe(Physics.JUMP_FORCE);
        h.ticks$.next();
        expect(h.last().tickCount).toBe(2);
        expect(h.last().actor.onGround).toBe(false);
        h.sub.unsubscribe();
    });

    it("freezes while paused and ignores mute", () => {
        const h = harness();
        h.ticks$.next();
        h.input$.next("pause");
        const paused = h.last();
        h.ticks$.next();
        h.input$.next("mute");
        expect(h.last()).toBe(paused);
        h.input$.next("pause");
        h.ticks$.next();
        expect(h.last().tickCount).toBe(2);
        h.sub.unsubscribe();
    });

    it("only restarts a finished run", () => {
        const h = harness();
        h.ticks$.next();
        h.ticks$.next();
        h.input$.next("restart");
        expect(h.last().tickCount).toBe(2);
        h.sub.unsubscribe();
    });
});

describe("derived notifications", () => {
    it("gameOver$ fires once per game over", () => {
        const got: number[] = [];
        gameOver$(
            from([
                withRun({ score: 1 }),
                withRun({ score: 3 }, { gameOver: true }),
                withRun({ score: 3 }, { gameOver: true }),
                withRun({ score: 0 }),
                withRun({ score: 7 }, { gameOver: true }),
            ]),
        ).subscribe(score => got.push(score));
        expect(got).toEqual([3, 7]);
    });

    it("milestone$ fires when a new threshold is crossed", () => {
        const got: number[] = [];
        milestone$(
            from([0, 10, 25, 26, 50, 0, 25].map(score => withRun({ score }))),
        ).subscribe(m => got.push(m));
        expect(got).toEqual([25, 50, 25]);
    });

    it("persistHighScore writes each new record once", () => {
        const { store, saved } = memoryHighScoreStore();
        persistHighScore(
            from([0, 0, 10, 10, 12].map(highScore => withRun({ highScore }))),
            store,
        );
        expect(saved).toEqual([10, 12]);
    });
});
