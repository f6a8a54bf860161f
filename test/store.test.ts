import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { lastValueFrom } from "rxjs";
import { fileHighScoreStore, memoryHighScoreStore, parseHighScore } from "../src/main";

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "dash-runner-"));
});

afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
});

describe("parseHighScore", () => {
    it("reads a trimmed non-negative integer", () => {
        expect(parseHighScore(" 17\n")).toBe(17);
    });

    it("treats anything else as 0", () => {
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        expect(parseHighScore("abc")).toBe(0);
        expect(parseHighScore("-4")).toBe(0);
        expect(parseHighScore("")).toBe(0);
    });
});

describe("fileHighScoreStore", () => {
    it("round-trips a saved score", async () => {
        const store = fileHighScoreStore(join(dir, "highscore.txt"));
        await lastValueFrom(store.save(42));
        expect(await lastValueFrom(store.load())).toBe(42);
    });

    it("loads 0 when the file is missing", async () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
        const store = fileHighScoreStore(join(dir, "missing.txt"));
        expect(await lastValueFrom(store.load())).toBe(0);
        expect(error).toHaveBeenCalledTimes(1);
    });

    it("loads 0 from a corrupted file", async () => {
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const path = join(dir, "highscore.txt");
        await writeFile(path, "abc");
        expect(await lastValueFrom(fileHighScoreStore(path).load())).toBe(0);
    });

    it("completes a failed write after logging it", async () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
        const store = fileHighScoreStore(join(dir, "no", "such", "dir", "hs.txt"));
        await expect(lastValueFrom(store.save(3))).resolves.toBeUndefined();
        expect(error).toHaveBeenCalledTimes(1);
    });
});

describe("memoryHighScoreStore", () => {
    it("loads the last saved value", async () => {
        const { store, saved } = memoryHighScoreStore(5);
        expect(await lastValueFrom(store.load())).toBe(5);
        await lastValueFrom(store.save(9));
        expect(saved).toEqual([9]);
        expect(await lastValueFrom(store.load())).toBe(9);
    });
});
