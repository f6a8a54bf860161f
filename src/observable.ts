/** ============================
 * Run streams
 *
 * Turns ticks and key actions into reducers and folds them into the run
 * state, plus the notifications derived from it. Drawing lives in view.ts.
 * ============================ */
import {
    Observable,
    Subscription,
    concatMap,
    distinctUntilChanged,
    filter,
    interval,
    map,
    merge,
    pairwise,
    scan,
    shareReplay,
    skip,
} from "rxjs";
import { type RunOptions, resolveRunOptions } from "./config";
import { milestoneOf } from "./difficulty";
import {
    actorJump,
    actorShoot,
    actorSlide,
    createState,
    restartGame,
    tick,
    togglePause,
} from "./state";
import type { HighScoreStore } from "./store";
import { Constants, type InputAction, type State } from "./types";

type Reducer = (s: State) => State;

/** Key as reported by node:readline keypress events */
export type KeyPress = Readonly<{
    name?: string;
    sequence?: string;
    ctrl?: boolean;
}>;

const KEY_ACTIONS: Readonly<Record<string, InputAction>> = {
    space: "jump",
    up: "jump",
    w: "jump",
    down: "slide",
    s: "slide",
    f: "shoot",
    x: "shoot",
    r: "restart",
    p: "pause",
    m: "mute",
};

/** Maps a key to an action; unbound keys map to null */
export const actionFromKey = (key: KeyPress): InputAction | null => {
    if (key.ctrl) return null;
    const name = key.name ?? (key.sequence === " " ? "space" : key.sequence);
    return name !== undefined ? (KEY_ACTIONS[name.toLowerCase()] ?? null) : null;
};

/** restartR: only a finished run can be restarted */
const restartR =
    (now: number, seed: number): Reducer =>
    (s: State): State =>
        s.gameOver ? restartGame(s, now, seed) : s;

/** muteR: sound is outside the simulation */
const muteR: Reducer = s => s;

const ACTION_REDUCERS: Readonly<Record<Exclude<InputAction, "restart">, Reducer>> = {
    jump: actorJump,
    slide: actorSlide,
    shoot: actorShoot,
    pause: togglePause,
    mute: muteR,
};

/** Create the State stream for a run driven by `input$` */
export const state$ = (
    input$: Observable<InputAction>,
    options: Partial<RunOptions> = {},
): Observable<State> => {
    const opts = resolveRunOptions(options);
    const baseState = createState(
        opts.clock(),
        opts.nextSeed(),
        opts.highScore,
        opts.weights,
    );

    // Timebase
    const tick$ = opts.ticks$ ?? interval(opts.tickMs);

    const tickReducers$ = tick$.pipe(map(() => tick(opts.clock())));
    const inputReducers$ = input$.pipe(
        map(action =>
            action === "restart"
                ? restartR(opts.clock(), opts.nextSeed())
                : ACTION_REDUCERS[action],
        ),
    );

    // Ticks and actions interleave in arrival order; each is applied to the
    // state the previous one left.
    return merge(tickReducers$, inputReducers$).pipe(
        scan((s: State, reducer: Reducer) => reducer(s), baseState),
        shareReplay({ bufferSize: 1, refCount: true }),
    );
};

/** Final score of every run, once per game over */
export const gameOver$ = (states: Observable<State>): Observable<number> =>
    states.pipe(
        distinctUntilChanged((a, b) => a.gameOver === b.gameOver),
        filter(s => s.gameOver),
        map(s => s.run.score),
    );

/** Score threshold each time a new milestone is crossed (cosmetic only) */
export const milestone$ = (states: Observable<State>): Observable<number> =>
    states.pipe(
        map(s => milestoneOf(s.run.score)),
        distinctUntilChanged(),
        pairwise(),
        filter(([prev, next]) => next > prev),
        map(([, next]) => next * Constants.MILESTONE_STEP),
    );

/** Fire-and-forget write of every new record */
export const persistHighScore = (
    states: Observable<State>,
    store: HighScoreStore,
): Subscription =>
    states
        .pipe(
            map(s => s.run.highScore),
            distinctUntilChanged(),
            skip(1),
            concatMap(score => store.save(score)),
        )
        .subscribe({
            error: (err: unknown) => console.error("High score writer stopped:", err),
        });
