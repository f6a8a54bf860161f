/** ============================
 * Difficulty curves: pure, clamped functions of score
 * ============================ */
import { Constants, Difficulty } from "./types";

/** Base obstacle speed; +0.2 every 10 points, capped at MAX_SPEED */
export const difficultySpeed = (score: number): number =>
    Math.min(
        Difficulty.BASE_SPEED +
            Math.floor(Math.max(0, score) / Difficulty.SPEED_EVERY) *
                Difficulty.SPEED_STEP,
        Difficulty.MAX_SPEED,
    );

/** Minimum ms between spawns; -50 every 5 points, floored at MIN_INTERVAL_MS */
export const spawnInterval = (score: number): number =>
    Math.max(
        Difficulty.BASE_INTERVAL_MS -
            Math.floor(Math.max(0, score) / Difficulty.INTERVAL_EVERY) *
                Difficulty.INTERVAL_STEP_MS,
        Difficulty.MIN_INTERVAL_MS,
    );

/** Index of the last milestone reached (0 below the first) */
export const milestoneOf = (score: number): number =>
    Math.floor(Math.max(0, score) / Constants.MILESTONE_STEP);
