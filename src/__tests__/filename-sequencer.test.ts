import { describe, it, expect, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  applyRenamePlan,
  computeTarget,
  planRenames,
  resolveSequenceTarget,
  sequenceFiles,
} from "../services/filename-sequencer.js";
import { stitchErrorFrom, stitchErrorFromSync } from "./helpers/errors.js";
import { listDir, makeTempDir, removeTempDirs } from "./helpers/images.js";

const PNG_ONLY = [".png"];

async function dirWith(prefix: string, files: Record<string, string>): Promise<string> {
  const dir = await makeTempDir(prefix);
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content);
  }
  return dir;
}

afterAll(async () => {
  await removeTempDirs();
});

describe("computeTarget", () => {
  it("numbers from one", () => {
    expect(computeTarget("a.png", "number", 0)).toBe("1 a.png");
  });

  it("replaces an existing prefix when numbering", () => {
    expect(computeTarget("7 a.png", "number", 1)).toBe("2 a.png");
  });

  it("strips the prefix when unnumbering", () => {
    expect(computeTarget("12 a b.png", "unnumber", 0)).toBe("a b.png");
  });

  it("leaves names without a prefix alone when unnumbering", () => {
    expect(computeTarget("12a.png", "unnumber", 0)).toBe("12a.png");
  });
});

describe("planRenames", () => {
  it("numbers in byte order, uppercase before lowercase", () => {
    const plan = planRenames("/d", ["b.png", "B.png", "a.png"], "number", []);
    expect(plan.changes.map((e) => [e.source, e.target])).toEqual([
      ["B.png", "1 B.png"],
      ["a.png", "2 a.png"],
      ["b.png", "3 b.png"],
    ]);
    expect(plan.unchanged).toEqual([]);
  });

  it("renumbers and reports names that already match", () => {
    const plan = planRenames("/d", ["3 x.png", "1 y.png"], "number", ["3 x.png", "1 y.png"]);
    expect(plan.changes).toEqual([{ source: "3 x.png", prefix: 3, target: "2 x.png" }]);
    expect(plan.unchanged).toEqual([{ source: "1 y.png", prefix: 1, target: "1 y.png" }]);
  });

  it("skips names without a prefix when unnumbering", () => {
    const plan = planRenames("/d", ["2 b.png", "c.png"], "unnumber", []);
    expect(plan.changes).toEqual([{ source: "2 b.png", prefix: 2, target: "b.png" }]);
    expect(plan.unchanged.map((e) => e.source)).toEqual(["c.png"]);
  });

  it("rejects two sources that map to one target", () => {
    const error = stitchErrorFromSync(() => planRenames("/d", ["1 a.png", "2 a.png"], "unnumber", []));
    expect(error.code).toBe("RENAME_CONFLICT");
    expect(error.message).toBe(
      'Rename aborted, no files were changed: "1 a.png", "2 a.png" would all become "a.png"'
    );
  });

  it("rejects a target held by a file outside the batch", () => {
    const error = stitchErrorFromSync(() =>
      planRenames("/d", ["1 a.png"], "unnumber", ["1 a.png", "a.png"])
    );
    expect(error.code).toBe("RENAME_CONFLICT");
    expect(error.message).toContain('"a.png" already exists');
  });

  it("allows a target held by another file in the batch", () => {
    const plan = planRenames("/d", ["2 a.png", "a.png"], "number", ["2 a.png", "a.png"]);
    expect(plan.changes.map((e) => [e.source, e.target])).toEqual([
      ["2 a.png", "1 a.png"],
      ["a.png", "2 a.png"],
    ]);
  });

  it("rejects an empty target name", () => {
    const error = stitchErrorFromSync(() => planRenames("/d", ["7 "], "unnumber", ["7 "]));
    expect(error.code).toBe("RENAME_CONFLICT");
    expect(error.message).toContain('"7 " would be renamed to an empty name');
  });
});

describe("resolveSequenceTarget", () => {
  it("takes matching regular files from a single directory", async () => {
    const dir = await dirWith("resolve", { "a.png": "", "b.PNG": "", "notes.txt": "" });
    await fs.mkdir(path.join(dir, "sub.png"));

    const target = await resolveSequenceTarget([dir], PNG_ONLY);

    expect(target.directory).toBe(dir);
    expect([...target.filenames].sort()).toEqual(["a.png", "b.PNG"]);
  });

  it("takes explicit files as given, whatever their extension", async () => {
    const dir = await dirWith("explicit", { "a.png": "", "notes.txt": "" });
    const target = await resolveSequenceTarget([path.join(dir, "notes.txt")], PNG_ONLY);
    expect(target).toEqual({ directory: dir, filenames: ["notes.txt"] });
  });

  it("rejects files from different directories", async () => {
    const one = await dirWith("one", { "a.png": "" });
    const two = await dirWith("two", { "b.png": "" });
    const error = await stitchErrorFrom(
      resolveSequenceTarget([path.join(one, "a.png"), path.join(two, "b.png")], PNG_ONLY)
    );
    expect(error.code).toBe("INVALID_INPUT");
    expect(error.message).toBe("All files must be in the same directory, got 2 directories");
  });

  it("rejects a directory with no matching files", async () => {
    const dir = await dirWith("empty", { "notes.txt": "" });
    const error = await stitchErrorFrom(resolveSequenceTarget([dir], PNG_ONLY));
    expect(error.code).toBe("INVALID_INPUT");
  });

  it("rejects a missing path", async () => {
    const dir = await makeTempDir("gone");
    const missing = path.join(dir, "gone.png");
    const error = await stitchErrorFrom(resolveSequenceTarget([missing], PNG_ONLY));
    expect(error.message).toBe(`Path not found: ${missing}`);
  });
});

describe("sequenceFiles", () => {
  it("numbers then unnumbers a directory back to its original names", async () => {
    const dir = await dirWith("roundtrip", { "b.png": "B", "a.png": "A" });

    const numbered = await sequenceFiles([dir], "number", PNG_ONLY);
    expect(await listDir(dir)).toEqual(["1 a.png", "2 b.png"]);
    expect(numbered.renamed).toHaveLength(2);
    expect(await fs.readFile(path.join(dir, "1 a.png"), "utf8")).toBe("A");

    await sequenceFiles([dir], "unnumber", PNG_ONLY);
    expect(await listDir(dir)).toEqual(["a.png", "b.png"]);
  });

  it("renames only the files given explicitly", async () => {
    const dir = await dirWith("subset", { "a.png": "", "b.png": "", "c.png": "" });
    await sequenceFiles([path.join(dir, "c.png"), path.join(dir, "b.png")], "number", PNG_ONLY);
    expect(await listDir(dir)).toEqual(["1 b.png", "2 c.png", "a.png"]);
  });

  it("leaves the directory untouched on a conflict", async () => {
    const dir = await dirWith("conflict", { "1 a.png": "", "2 a.png": "", "b.png": "" });
    const before = await listDir(dir);

    const error = await stitchErrorFrom(sequenceFiles([dir], "unnumber", PNG_ONLY));

    expect(error.code).toBe("RENAME_CONFLICT");
    expect(await listDir(dir)).toEqual(before);
  });

  it("refuses to overwrite a file outside the batch", async () => {
    const dir = await dirWith("occupied", { "1 a.png": "numbered", "a.png": "bare" });

    const error = await stitchErrorFrom(sequenceFiles([path.join(dir, "1 a.png")], "unnumber", PNG_ONLY));

    expect(error.code).toBe("RENAME_CONFLICT");
    expect(await fs.readFile(path.join(dir, "a.png"), "utf8")).toBe("bare");
  });

  it("moves contents correctly when targets are other files' names", async () => {
    const dir = await dirWith("chain", { "2 a.png": "first", "a.png": "second" });

    await sequenceFiles([dir], "number", PNG_ONLY);

    expect(await listDir(dir)).toEqual(["1 a.png", "2 a.png"]);
    expect(await fs.readFile(path.join(dir, "1 a.png"), "utf8")).toBe("first");
    expect(await fs.readFile(path.join(dir, "2 a.png"), "utf8")).toBe("second");
  });
});

describe("applyRenamePlan", () => {
  it("keeps finished renames and reports the rest when one fails", async () => {
    const dir = await dirWith("partial", { "a.png": "", "c.png": "" });

    const error = await stitchErrorFrom(
      applyRenamePlan({
        directory: dir,
        changes: [
          { source: "a.png", prefix: null, target: "1 a.png" },
          { source: "missing.png", prefix: null, target: "2 missing.png" },
          { source: "c.png", prefix: null, target: "3 c.png" },
        ],
        unchanged: [],
      })
    );

    expect(error.code).toBe("PARTIAL_RENAME_FAILURE");
    expect(error.message.split("\n").slice(1)).toEqual([
      'Renamed: "a.png" → "1 a.png"',
      'Not renamed: "missing.png", "c.png"',
    ]);
    expect(await listDir(dir)).toEqual(["1 a.png", "c.png"]);
  });

  it("returns an empty report for a plan with no changes", async () => {
    const dir = await makeTempDir("noop");
    const unchanged = [{ source: "1 a.png", prefix: 1, target: "1 a.png" }];
    await expect(applyRenamePlan({ directory: dir, changes: [], unchanged })).resolves.toEqual({
      directory: dir,
      renamed: [],
      unchanged,
    });
  });
});
