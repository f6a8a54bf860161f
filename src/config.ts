/** ============================
 * Configuration
 *
 * Obstacle weight tables (CSV) and run options with defaults. Bad input
 * degrades to defaults instead of failing.
 * ============================ */
import type { Observable } from "rxjs";
import { DEFAULT_WEIGHTS, isObstacleKind } from "./obstacles";
import { Constants, type ObstacleKind, type Weights } from "./types";
import { toSeed } from "./util";

export type RunOptions = Readonly<{
    tickMs: number;
    /** Monotonic ms clock used for spawn timing */
    clock: () => number;
    /** Seed source for each new run */
    nextSeed: () => number;
    highScore: number;
    weights: Weights;
    /** Overrides the interval timebase (tests drive ticks by hand) */
    ticks$?: Observable<unknown>;
}>;

export const defaultRunOptions = (): RunOptions => ({
    tickMs: Constants.TICK_RATE_MS,
    clock: () => performance.now(),
    nextSeed: () => toSeed(Math.random() * 0x7fffffff),
    highScore: 0,
    weights: DEFAULT_WEIGHTS,
});

export const resolveRunOptions = (over: Partial<RunOptions> = {}): RunOptions => {
    const base = defaultRunOptions();
    const tickMs =
        over.tickMs !== undefined && Number.isFinite(over.tickMs) && over.tickMs > 0
            ? over.tickMs
            : base.tickMs;
    const highScore =
        over.highScore !== undefined &&
        Number.isInteger(over.highScore) &&
        over.highScore >= 0
            ? over.highScore
            : base.highScore;
    return { ...base, ...over, tickMs, highScore };
};

type WeightRow = Readonly<{ kind: ObstacleKind; weight: number }>;

/** One `kind,weight` row, or null (logged) when it cannot be used */
const parseWeightRow = (line: string): WeightRow | null => {
    const cols = line.split(",").map(col => col.trim());
    if (cols.length !== 2 || cols[0] === "") {
        console.warn(`Ignoring malformed obstacle row "${line}"`);
        return null;
    }
    const [name, raw] = cols;
    const weight = Number(raw);
    if (raw === "" || !Number.isInteger(weight) || weight < 1) {
        console.warn(`Ignoring obstacle weight "${raw}" for "${name}"`);
        return null;
    }
    const kind = name.toLowerCase();
    if (!isObstacleKind(kind)) {
        console.warn(`Ignoring unknown obstacle type "${name}"`);
        return null;
    }
    return { kind, weight };
};

/**
 * Parse a `kind,weight` CSV (header row first) into spawn weights.
 * Kinds not listed keep their default weight. Rows that are malformed,
 * name an unknown kind or carry a weight below 1 are skipped.
 */
export const parseObstacleTable = (csv: string): Weights =>
    csv
        .trim()
        .split(/\r?\n/)
        .slice(1)
        .filter(line => line.trim() !== "")
        .map(parseWeightRow)
        .filter((row): row is WeightRow => row !== null)
        .reduce<Weights>(
            (acc, row) => ({ ...acc, [row.kind]: row.weight }),
            DEFAULT_WEIGHTS,
        );
