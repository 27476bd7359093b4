import { describe, it, expect, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { HELP_TEXT, parseArgs, runCli } from "../cli.js";
import type { CliIO } from "../cli.js";
import { formatGridCandidate } from "../format.js";
import { RED, listDir, makeTempDir, removeTempDirs, writeSolidImage } from "./helpers/images.js";

const VERSION = "9.9.9";

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

async function run(argv: string[], env: NodeJS.ProcessEnv = {}) {
  const io = captureIO();
  const code = await runCli(argv, { version: VERSION, io, env });
  return { code, stdout: io.stdout, stderr: io.stderr };
}

afterAll(async () => {
  await removeTempDirs();
});

describe("parseArgs", () => {
  it("reads flags in both spellings", () => {
    const args = parseArgs(["grid", "--rows", "2", "--cols=3", "--center", "a.png", "b.png"]);
    expect(args).toMatchObject({ action: "grid", rows: 2, cols: 3, center: true, paths: ["a.png", "b.png"] });
  });

  it("treats everything after -- as a path", () => {
    expect(parseArgs(["number", "--", "--odd.png"]).paths).toEqual(["--odd.png"]);
  });

  it("rejects an unknown option", () => {
    expect(() => parseArgs(["grid", "--colour", "red", "a.png"])).toThrow("Unknown option: --colour");
  });

  it("rejects a value flag without a value", () => {
    expect(() => parseArgs(["grid", "a.png", "--rows"])).toThrow("--rows requires a value");
  });

  it("rejects a missing path list", () => {
    expect(() => parseArgs(["horizontal"])).toThrow("No files provided");
  });

  it("rejects an unknown action", () => {
    expect(() => parseArgs(["rotate", "a.png"])).toThrow("Action must be one of:");
  });
});

describe("runCli", () => {
  it("--version prints the version", async () => {
    const result = await run(["--version"]);
    expect(result).toEqual({ code: 0, stdout: [VERSION], stderr: [] });
  });

  it("-h prints usage", async () => {
    const result = await run(["-h"]);
    expect(result.code).toBe(0);
    expect(result.stdout).toEqual([`image-stitcher v${VERSION}\n\n${HELP_TEXT}`]);
  });

  it("reads -v after -- as a path", async () => {
    const result = await run(["grids", "--", "-v"]);
    expect(result).toEqual({
      code: 2,
      stdout: [],
      stderr: ["Error: No .png, .tif, .tiff files provided"],
    });
  });

  it("still honours -v before --", async () => {
    const result = await run(["grids", "-v", "--", "a.png"]);
    expect(result).toEqual({ code: 0, stdout: [VERSION], stderr: [] });
  });

  it("prints usage to stderr and exits 2 with no arguments", async () => {
    const result = await run([]);
    expect(result.code).toBe(2);
    expect(result.stderr).toEqual([HELP_TEXT]);
  });

  it("exits 2 on bad arguments", async () => {
    const result = await run(["grid", "--rows", "two", "a.png"]);
    expect(result.code).toBe(2);
    expect(result.stderr[0]).toMatch(/^Error: /);
  });

  it("lists grids for the given files", async () => {
    const files = ["1.png", "2.png", "3.png", "4.png", "5.png", "6.png"].map((n) => `/photos/${n}`);
    const result = await run(["grids", ...files]);
    expect(result.code).toBe(0);
    const lines = result.stdout[0].split("\n");
    expect(lines[0]).toBe("Total files: 6");
    expect(lines[1]).toBe(formatGridCandidate({ rows: 2, cols: 3, blanks: 0, exact: true }));
    expect(lines).toHaveLength(7);
  });

  it("stitches a strip and reports where it went", async () => {
    const dir = await makeTempDir("cli-strip");
    const a = await writeSolidImage(dir, "1 a.png", 4, 4, RED);
    const b = await writeSolidImage(dir, "2 b.png", 4, 4, RED);

    const result = await run(["horizontal", "--format", "png", a, b]);

    expect(result.code).toBe(0);
    expect(result.stdout[0].split("\n")).toEqual([
      "Stitched 2 image(s) → 8×4 (horizontal)",
      `Saved to: ${path.join(dir, "stitched_horizontal_1-2.png")}`,
    ]);
  });

  it("takes the output format from the environment", async () => {
    const dir = await makeTempDir("cli-env");
    const a = await writeSolidImage(dir, "a.png", 4, 4, RED);

    const result = await run(["vertical", a], { IMAGE_STITCHER_FORMAT: "png" });

    expect(result.code).toBe(0);
    expect(await listDir(dir)).toEqual(["a.png", "stitched_vertical.png"]);
  });

  it("exits 2 for a missing input", async () => {
    const dir = await makeTempDir("cli-missing");
    const result = await run(["horizontal", path.join(dir, "gone.png")]);
    expect(result.code).toBe(2);
  });

  it("exits 3 for an undecodable input", async () => {
    const dir = await makeTempDir("cli-bad");
    const bad = path.join(dir, "bad.png");
    await fs.writeFile(bad, "garbage");
    const result = await run(["horizontal", bad]);
    expect(result.code).toBe(3);
    expect(result.stderr[0]).toMatch(/^Error: Failed to load bad\.png: /);
  });

  it("numbers and unnumbers a directory", async () => {
    const dir = await makeTempDir("cli-number");
    await fs.writeFile(path.join(dir, "b.png"), "");
    await fs.writeFile(path.join(dir, "a.png"), "");

    const numbered = await run(["number", dir]);
    expect(numbered.code).toBe(0);
    expect(numbered.stdout[0].split("\n")).toEqual([
      '"a.png" → "1 a.png"',
      '"b.png" → "2 b.png"',
      `Renamed 2 file(s) in ${dir}`,
    ]);

    expect((await run(["unnumber", dir])).code).toBe(0);
    expect(await listDir(dir)).toEqual(["a.png", "b.png"]);
  });

  it("exits 4 on a rename conflict", async () => {
    const dir = await makeTempDir("cli-conflict");
    await fs.writeFile(path.join(dir, "1 a.png"), "");
    await fs.writeFile(path.join(dir, "2 a.png"), "");
    const result = await run(["unnumber", dir]);
    expect(result.code).toBe(4);
    expect(await listDir(dir)).toEqual(["1 a.png", "2 a.png"]);
  });

  it("marks files and reports gaps", async () => {
    const dir = await makeTempDir("cli-gaps");
    for (const name of ["1 t.png", "2 t.png", "3 t.png", "4 t.png"]) {
      await fs.writeFile(path.join(dir, name), "");
    }

    const marked = await run(["mark", path.join(dir, "3 t.png")]);
    expect(marked.stdout).toEqual([`Marked: ${path.join(dir, "3 tz.png")}`]);

    const gaps = await run(["gaps", dir]);
    expect(gaps.code).toBe(0);
    expect(gaps.stdout).toEqual(["Gaps: 2   |   Total: 1   |   Sum: 2"]);
  });
});
