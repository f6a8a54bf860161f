/** ============================
 * View (terminal renderer)
 *
 * Pure state in → text frame out; `render` is the only side effect.
 * Rendering never feeds back into the simulation.
 * ============================ */
import { actorHitbox } from "./actor";
import { obstacleRect } from "./obstacles";
import { isNewRecord } from "./scoring";
import { particleAlpha } from "./particles";
import { projectileRect } from "./projectiles";
import { Viewport, type ObstacleKind, type Obstacle, type RGB, type Rect, type State } from "./types";

export const Screen = {
    COLS: 80,
    ROWS: 24,
} as const;

const CELL_W = Viewport.CANVAS_WIDTH / Screen.COLS;
const CELL_H = Viewport.CANVAS_HEIGHT / Screen.ROWS;

export type Sprite = Readonly<{ glyph: string; color: RGB }>;

const PALETTES: Readonly<Record<ObstacleKind, readonly RGB[]>> = {
    stone: [
        [120, 120, 120],
        [145, 115, 80],
        [110, 130, 90],
    ],
    cactus: [
        [60, 140, 50],
        [50, 120, 110],
    ],
    bush: [
        [50, 110, 40],
        [130, 90, 30],
        [180, 40, 40],
    ],
    balloon: [
        [220, 40, 40],
        [40, 80, 220],
        [230, 210, 50],
        [40, 180, 50],
        [160, 40, 190],
    ],
    bat: [[70, 50, 90]],
    feather: [
        [255, 255, 255],
        [180, 220, 255],
        [120, 180, 255],
        [180, 220, 255],
        [230, 240, 255],
    ],
    ammo: [
        [255, 200, 40],
        [255, 150, 30],
        [255, 90, 20],
        [255, 150, 30],
        [255, 230, 90],
    ],
};

const GLYPHS: Readonly<Record<ObstacleKind, string>> = {
    stone: "O",
    cactus: "Y",
    bush: "#",
    balloon: "Q",
    bat: "V",
    feather: "^",
    ammo: "*",
};

/** Drawable for an obstacle kind; `variant` picks among its palettes */
export const spriteFor = (kind: ObstacleKind, variant: number): Sprite => {
    const palette = PALETTES[kind];
    return {
        glyph: GLYPHS[kind],
        color: palette[Math.abs(Math.trunc(variant)) % palette.length],
    };
};

/** Power-ups cycle their palette; everything else keeps its variant */
const obstacleSprite = (o: Obstacle): Sprite =>
    o.kind === "feather" || o.kind === "ammo"
        ? spriteFor(o.kind, o.paletteIndex)
        : spriteFor(o.kind, o.variant);

type Grid = string[][];

const plot = (grid: Grid, px: number, py: number, glyph: string): void => {
    const col = Math.floor(px / CELL_W);
    const row = Math.floor(py / CELL_H);
    if (row >= 0 && row < Screen.ROWS && col >= 0 && col < Screen.COLS)
        grid[row][col] = glyph;
};

const fill = (grid: Grid, r: Rect, glyph: string): void => {
    for (let y = r.y; y < r.y + r.h; y += CELL_H)
        for (let x = r.x; x < r.x + r.w; x += CELL_W) plot(grid, x, y, glyph);
};

const write = (grid: Grid, px: number, py: number, text: string): void =>
    [...text].forEach((ch, i) => plot(grid, px + i * CELL_W, py, ch));

const ACTOR_GLYPH = {
    idle: "@",
    run: "@",
    jump: "@",
    fall: "@",
    slide: "_",
    dead: "x",
} as const;

/** HUD line: run totals and charges */
export const hud = (s: State): string =>
    [
        `Score: ${s.run.score}`,
        `High: ${s.run.highScore}`,
        `Speed: ${s.run.speed.toFixed(1)}`,
        ...(s.run.combo > 1 ? [`Combo: ${s.run.combo}x`] : []),
        `Jumps: ${s.actor.doubleJumpCharges}`,
        `Shots: ${s.actor.shotCharges}`,
    ].join("  ");

export const renderFrame = (s: State): string => {
    const grid: Grid = Array.from({ length: Screen.ROWS }, () =>
        Array.from({ length: Screen.COLS }, () => " "),
    );

    fill(
        grid,
        { x: 0, y: Viewport.GROUND_LEVEL, w: Viewport.CANVAS_WIDTH, h: CELL_H },
        "=",
    );
    s.obstacles.forEach(o => fill(grid, obstacleRect(o), obstacleSprite(o).glyph));
    s.projectiles.forEach(p => fill(grid, projectileRect(p), "-"));
    fill(grid, actorHitbox(s.actor), ACTOR_GLYPH[s.actor.anim]);
    s.particles.items
        .filter(p => particleAlpha(p) > 0.25)
        .forEach(p => plot(grid, p.x, p.y, "."));
    s.popups.forEach(p => write(grid, p.x, p.y, p.text));

    const midY = Viewport.CANVAS_HEIGHT / 3;
    const banner = (text: string, y: number = midY) =>
        write(grid, (Viewport.CANVAS_WIDTH - text.length * CELL_W) / 2, y, text);
    if (s.gameOver) {
        banner(`GAME OVER! Final Score: ${s.run.score}  (R to restart)`);
        if (isNewRecord(s.run)) banner("NEW HIGH SCORE!", midY + 2 * CELL_H);
    } else if (s.paused) banner("PAUSED");

    return [hud(s), ...grid.map(row => row.join(""))].join("\n");
};

/** Writes each frame to stdout, redrawing in place */
export const render = (): ((s: State) => void) => (s: State) => {
    process.stdout.write(`\x1b[H\x1b[2J${renderFrame(s)}\n`);
};
