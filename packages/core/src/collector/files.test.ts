import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, readdir, rm, symlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { gatherFiles, defaultFileName } from "./files.js";
import { RecordingLogger } from "../test-utils.js";

let dir: string;
let logger: RecordingLogger;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "gist-new-collect-"));
  logger = new RecordingLogger();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("defaultFileName", () => {
  it("appends .md to the display name", () => {
    expect(defaultFileName("notes")).toBe("notes.md");
  });
});

describe("gatherFiles", () => {
  it("returns files sorted by name", async () => {
    await writeFile(join(dir, "b.txt"), "bee");
    await writeFile(join(dir, "a.txt"), "ay");

    const files = await gatherFiles(dir, "notes", logger);

    expect(files.map((f) => f.name)).toEqual(["a.txt", "b.txt"]);
    expect(files[0]).toEqual({ name: "a.txt", path: join(dir, "a.txt"), content: Buffer.from("ay") });
    expect(files[1].content.toString()).toBe("bee");
  });

  it("sorts by code unit rather than locale", async () => {
    await writeFile(join(dir, "alpha.txt"), "1");
    await writeFile(join(dir, "_mid.txt"), "2");
    await writeFile(join(dir, "Zeta.txt"), "3");

    const files = await gatherFiles(dir, "notes", logger);

    expect(files.map((f) => f.name)).toEqual(["Zeta.txt", "_mid.txt", "alpha.txt"]);
  });

  it("skips dotfiles and logs them in verbose mode only", async () => {
    await writeFile(join(dir, ".env"), "SECRET=test-secret");
    await writeFile(join(dir, "main.ts"), "export {};\n");

    const files = await gatherFiles(dir, "notes", logger);

    expect(files.map((f) => f.name)).toEqual(["main.ts"]);
    expect(logger.verboses).toContain("Skipping dotfile .env");
    expect(logger.infos).toEqual([]);
  });

  it("logs queued files with their size", async () => {
    await writeFile(join(dir, "a.txt"), "hello");
    await gatherFiles(dir, "notes", logger);
    expect(logger.verboses).toEqual(["Queued a.txt (5 bytes)"]);
  });

  it("fails on a subdirectory even when dotfiles and regular files come first", async () => {
    await writeFile(join(dir, ".secret"), "x");
    await writeFile(join(dir, "b.txt"), "b");
    await writeFile(join(dir, "a.txt"), "a");
    await mkdir(join(dir, "sub"));

    await expect(gatherFiles(dir, "notes", logger)).rejects.toThrow(
      "subdirectory sub detected; gists only support flat file sets"
    );
  });

  it("fails on a dot-directory", async () => {
    await mkdir(join(dir, ".vscode"));
    await expect(gatherFiles(dir, "notes", logger)).rejects.toThrow(
      "subdirectory .vscode detected"
    );
  });

  it("fails on a symlink to a directory", async () => {
    const elsewhere = await mkdtemp(join(tmpdir(), "gist-new-target-"));
    try {
      await symlink(elsewhere, join(dir, "linked"));
      await expect(gatherFiles(dir, "notes", logger)).rejects.toThrow(
        "symlink linked targets a directory; gists cannot include directories"
      );
    } finally {
      await rm(elsewhere, { recursive: true, force: true });
    }
  });

  it("skips symlinks to files and dangling symlinks as non-regular", async () => {
    await writeFile(join(dir, "real.txt"), "real");
    await symlink(join(dir, "real.txt"), join(dir, "alias.txt"));
    await symlink(join(dir, "missing.txt"), join(dir, "broken.txt"));

    const files = await gatherFiles(dir, "notes", logger);

    expect(files.map((f) => f.name)).toEqual(["real.txt"]);
    expect(logger.verboses).toContain("Skipping non-regular file alias.txt");
    expect(logger.verboses).toContain("Skipping non-regular file broken.txt");
  });

  it("rejects content that is not valid UTF-8", async () => {
    await writeFile(join(dir, "image.bin"), Buffer.from([0xff, 0xfe, 0x00, 0x80]));
    await expect(gatherFiles(dir, "notes", logger)).rejects.toThrow(
      "image.bin is not valid UTF-8 text; gists cannot store binary files"
    );
  });

  it("accepts multi-byte UTF-8 text", async () => {
    await writeFile(join(dir, "greeting.txt"), "héllo wörld ✓\n");
    const files = await gatherFiles(dir, "notes", logger);
    expect(files[0].content.toString("utf8")).toBe("héllo wörld ✓\n");
  });

  it("bootstraps <displayName>.md in an empty directory and leaves it on disk", async () => {
    const files = await gatherFiles(dir, "notes", logger);

    expect(files).toEqual([
      { name: "notes.md", path: join(dir, "notes.md"), content: Buffer.from("# notes\n") },
    ]);
    expect(await readFile(join(dir, "notes.md"), "utf8")).toBe("# notes\n");
    expect(logger.infos).toEqual(["Directory was empty; created notes.md"]);
  });

  it("bootstraps when only dotfiles are present", async () => {
    await writeFile(join(dir, ".hidden"), "x");

    const files = await gatherFiles(dir, "drafts", logger);

    expect(files.map((f) => f.name)).toEqual(["drafts.md"]);
    expect((await readdir(dir)).sort()).toEqual([".hidden", "drafts.md"]);
  });
});
