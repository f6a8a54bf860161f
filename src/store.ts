/** ============================
 * High-score persistence
 *
 * A single non-negative integer. Failures are logged and degrade to 0 on
 * read; writes never surface errors to the simulation.
 * ============================ */
import { readFile, writeFile } from "node:fs/promises";
import { Observable, catchError, defer, from, map, of } from "rxjs";

export type HighScoreStore = Readonly<{
    load: () => Observable<number>;
    save: (score: number) => Observable<void>;
}>;

export const DEFAULT_HIGH_SCORE_PATH = "assets/highscore.txt";

/** Parses stored text; anything but a non-negative integer is 0 */
export const parseHighScore = (text: string): number => {
    const trimmed = text.trim();
    const n = Number(trimmed);
    if (trimmed === "" || !Number.isInteger(n) || n < 0) {
        console.warn(`Ignoring malformed high score "${trimmed}"`);
        return 0;
    }
    return n;
};

export const fileHighScoreStore = (
    path: string = DEFAULT_HIGH_SCORE_PATH,
): HighScoreStore => ({
    load: () =>
        defer(() => from(readFile(path, "utf8"))).pipe(
            map(parseHighScore),
            catchError((err: unknown) => {
                console.error("Error loading high score:", err);
                return of(0);
            }),
        ),
    save: (score: number) =>
        defer(() => from(writeFile(path, `${Math.max(0, Math.floor(score))}`))).pipe(
            catchError((err: unknown) => {
                console.error("Error saving high score:", err);
                return of(undefined);
            }),
        ),
});

/** In-process store; `saved` records every write */
export const memoryHighScoreStore = (initial = 0) => {
    const saved: number[] = [];
    const store: HighScoreStore = {
        load: () => of(saved.length > 0 ? saved[saved.length - 1] : initial),
        save: (score: number) => {
            saved.push(score);
            return of(undefined);
        },
    };
    return { store, saved };
};
