/**
 * Terminal entry point. Keypresses from stdin drive the run; the state
 * stream is rendered as text. The first key starts the game.
 *
 *   space / up / w   jump (again in the air with a double-jump charge)
 *   down / s         slide
 *   f / x            shoot
 *   r                restart after game over
 *   p                pause
 *   ctrl-c           quit
 */

import { readFile } from "node:fs/promises";
import { emitKeypressEvents } from "node:readline";
import { fileURLToPath } from "node:url";
import {
    Observable,
    catchError,
    defer,
    filter,
    forkJoin,
    from,
    fromEvent,
    map,
    of,
    share,
    switchMap,
    take,
} from "rxjs";
import { parseObstacleTable } from "./config";
import { DEFAULT_WEIGHTS } from "./obstacles";
import {
    type KeyPress,
    actionFromKey,
    gameOver$,
    milestone$,
    persistHighScore,
    state$,
} from "./observable";
import { fileHighScoreStore } from "./store";
import type { InputAction, Weights } from "./types";
import { render } from "./view";

// Public surface of the simulation
export * from "./types";
export * from "./actor";
export * from "./config";
export * from "./difficulty";
export * from "./obstacles";
export * from "./particles";
export * from "./projectiles";
export * from "./scoring";
export * from "./spawner";
export * from "./state";
export * from "./store";
export { actionFromKey, gameOver$, milestone$, persistHighScore, state$ } from "./observable";

export const OBSTACLE_TABLE_PATH = "assets/obstacles.csv";

/** Weight table from disk; a missing or unreadable file means defaults */
export const loadWeights = (path: string = OBSTACLE_TABLE_PATH): Observable<Weights> =>
    defer(() => from(readFile(path, "utf8"))).pipe(
        map(parseObstacleTable),
        catchError((err: unknown) => {
            console.error(`Error reading obstacle table ${path}:`, err);
            return of(DEFAULT_WEIGHTS);
        }),
    );

const isEntry =
    process.argv[1] !== undefined &&
    fileURLToPath(import.meta.url) === process.argv[1];

if (isEntry) {
    emitKeypressEvents(process.stdin);
    if (process.stdin.isTTY) process.stdin.setRawMode(true);

    const key$ = fromEvent(
        process.stdin,
        "keypress",
        (_str: string | undefined, key: KeyPress | undefined): KeyPress =>
            key ?? {},
    ).pipe(share());

    const quit$ = key$.pipe(filter(k => k.ctrl === true && k.name === "c"));
    const input$ = key$.pipe(
        map(actionFromKey),
        filter((a): a is InputAction => a !== null),
    );

    const store = fileHighScoreStore();

    // Load the record and weights, wait for the first key, then play
    const game$ = forkJoin([store.load(), loadWeights()]).pipe(
        switchMap(([highScore, weights]) =>
            key$.pipe(
                take(1),
                map(() => state$(input$, { highScore, weights })),
            ),
        ),
        share(),
    );

    const states$ = game$.pipe(switchMap(s$ => s$), share());

    persistHighScore(states$, store);
    gameOver$(states$).subscribe(score =>
        console.error(`Game over with ${score} points`),
    );
    milestone$(states$).subscribe(points =>
        console.error(`Milestone reached: ${points}`),
    );

    const draw = render();
    const running = states$.subscribe({
        next: draw,
        error: (err: unknown) => console.error("Simulation stopped:", err),
    });

    quit$.pipe(take(1)).subscribe(() => {
        running.unsubscribe();
        if (process.stdin.isTTY) process.stdin.setRawMode(false);
        process.exit(0);
    });
}
