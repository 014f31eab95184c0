import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, mkdir, writeFile, rm, symlink } from "node:fs/promises";
import { dirname, join, sep } from "node:path";
import { tmpdir } from "node:os";
import { walkDirectory, processFile } from "./walker.js";
import type { TraversalIssue } from "./walker.js";
import { createIgnoreMatcher } from "../ignore/matcher.js";
import { hashFile, sha256 } from "../utils/hash.js";
import { IoError, TraversalError } from "../errors.js";

vi.mock("../utils/hash.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../utils/hash.js")>();
  return { ...actual, hashFile: vi.fn(actual.hashFile) };
});

/** Delete the file just before hashing it, as if it vanished mid-walk. */
async function hashAfterDeleting(filePath: string | Buffer): Promise<string> {
  const actual = await vi.importActual<typeof import("../utils/hash.js")>("../utils/hash.js");
  await rm(filePath);
  return actual.hashFile(filePath);
}

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content);
  }
}

describe("walkDirectory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "kushn-walk-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  it("returns an empty list for an empty directory", async () => {
    expect(await walkDirectory(dir)).toEqual([]);
  });

  it("skips ignored directories", async () => {
    await writeTree(dir, { "keep.txt": "keep", "skip/ignored.txt": "ignored" });

    const entries = await walkDirectory(dir, { matcher: createIgnoreMatcher(["skip"]) });
    expect(entries).toEqual([
      { path: "keep.txt", hash: "6ca7ea2feefc88ecb5ed6356ed963f47dc9137f82526fdd25d618ea626d0803f" },
    ]);
  });

  it("hashes every file when nothing is ignored", async () => {
    await writeTree(dir, { "a.txt": "hello world" });
    expect(await walkDirectory(dir)).toEqual([
      { path: "a.txt", hash: "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9" },
    ]);
  });

  it("visits depth-first with siblings in name order", async () => {
    await writeTree(dir, {
      "c.txt": "c",
      "b.txt": "b",
      "a/z.txt": "z",
      "a/b/c.txt": "abc",
    });

    const entries = await walkDirectory(dir);
    expect(entries.map((e) => e.path)).toEqual(["a/b/c.txt", "a/z.txt", "b.txt", "c.txt"]);
    expect(entries[0]!.hash).toBe(sha256("abc"));
  });

  it("excludes file patterns at every depth", async () => {
    await writeTree(dir, {
      "app.log": "root log",
      "nested/debug.log": "nested log",
      "nested/keep.txt": "kept",
    });

    const entries = await walkDirectory(dir, { matcher: createIgnoreMatcher(["*.log"]) });
    expect(entries).toEqual([{ path: "nested/keep.txt", hash: sha256("kept") }]);
  });

  it("produces the same entries on repeated runs", async () => {
    await writeTree(dir, { "x/1.txt": "1", "x/2.txt": "2", "y.txt": "y" });
    const matcher = createIgnoreMatcher(["*.tmp"]);

    const first = await walkDirectory(dir, { matcher });
    const second = await walkDirectory(dir, { matcher });
    expect(second).toEqual(first);
  });

  it("does not read pruned directories", async () => {
    await writeTree(dir, { "keep.txt": "keep" });
    await mkdir(join(dir, "skip"));
    await symlink(join(dir, "does-not-exist"), join(dir, "skip", "dangling"));

    const entries = await walkDirectory(dir, { matcher: createIgnoreMatcher(["skip"]) });
    expect(entries.map((e) => e.path)).toEqual(["keep.txt"]);
  });

  it("follows symbolic links to files and directories", async () => {
    await writeTree(dir, { "real/data.txt": "data" });
    await symlink(join(dir, "real"), join(dir, "link-dir"));
    await symlink(join(dir, "real", "data.txt"), join(dir, "link-file.txt"));

    const entries = await walkDirectory(dir);
    expect(entries).toEqual([
      { path: "link-dir/data.txt", hash: sha256("data") },
      { path: "link-file.txt", hash: sha256("data") },
      { path: "real/data.txt", hash: sha256("data") },
    ]);
  });

  it("matches ignore rules against the link path, not the target", async () => {
    await writeTree(dir, { "real/data.txt": "data" });
    await symlink(join(dir, "real"), join(dir, "mirror"));

    const entries = await walkDirectory(dir, { matcher: createIgnoreMatcher(["mirror"]) });
    expect(entries.map((e) => e.path)).toEqual(["real/data.txt"]);
  });

  it.skipIf(process.platform !== "linux")("hashes files whose names are not valid UTF-8", async () => {
    await writeTree(dir, { "ok.txt": "ok" });
    const rawName = Buffer.from([0x66, 0xff, 0x2e, 0x74]);
    await writeFile(Buffer.concat([Buffer.from(dir + sep), rawName]), "bad");

    expect(await walkDirectory(dir)).toEqual([
      { path: "f\uFFFD.t", hash: sha256("bad") },
      { path: "ok.txt", hash: sha256("ok") },
    ]);
  });

  it.each(["strict", "lenient"] as const)("rejects with IoError when a file vanishes before hashing (%s)", async (policy) => {
    await writeTree(dir, { "a.txt": "a", "b.txt": "b" });
    vi.mocked(hashFile).mockImplementationOnce(hashAfterDeleting);
    const issues: TraversalIssue[] = [];

    await expect(
      walkDirectory(dir, { policy, onIssue: (issue) => issues.push(issue) }),
    ).rejects.toBeInstanceOf(IoError);
    expect(issues).toEqual([]);
  });

  describe("strict policy", () => {
    it("rejects on a broken symbolic link", async () => {
      await symlink(join(dir, "missing"), join(dir, "dangling"));

      await expect(walkDirectory(dir)).rejects.toBeInstanceOf(TraversalError);
      await expect(walkDirectory(dir)).rejects.toMatchObject({ kind: "traversal", path: "dangling" });
    });

    it("rejects on a symbolic link loop", async () => {
      await writeTree(dir, { "real/data.txt": "data" });
      await symlink(dir, join(dir, "real", "loop"));

      await expect(walkDirectory(dir, { policy: "strict" })).rejects.toMatchObject({
        name: "TraversalError",
        path: "real/loop",
      });
    });
  });

  describe("lenient policy", () => {
    it("reports a broken link and keeps walking", async () => {
      await writeTree(dir, { "a.txt": "a", "z.txt": "z" });
      await symlink(join(dir, "missing"), join(dir, "dangling"));

      const issues: TraversalIssue[] = [];
      const entries = await walkDirectory(dir, {
        policy: "lenient",
        onIssue: (issue) => issues.push(issue),
      });

      expect(entries.map((e) => e.path)).toEqual(["a.txt", "z.txt"]);
      expect(issues).toHaveLength(1);
      expect(issues[0]!.path).toBe("dangling");
      expect(issues[0]!.reason).toMatch(/^broken symbolic link/);
    });

    it("reports a symbolic link loop once and keeps walking", async () => {
      await writeTree(dir, { "real/data.txt": "data" });
      await symlink(dir, join(dir, "real", "loop"));

      const issues: TraversalIssue[] = [];
      const entries = await walkDirectory(dir, {
        policy: "lenient",
        onIssue: (issue) => issues.push(issue),
      });

      expect(entries.map((e) => e.path)).toEqual(["real/data.txt"]);
      expect(issues.map((i) => i.path)).toEqual(["real/loop"]);
      expect(issues[0]!.reason).toMatch(/^symbolic link loop/);
    });

    it("still rejects when the root cannot be read", async () => {
      await expect(
        walkDirectory(join(dir, "nope"), { policy: "lenient" }),
      ).rejects.toBeInstanceOf(TraversalError);
    });
  });
});

describe("processFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "kushn-file-"));
    await writeTree(dir, { "include.txt": "include me", "sub/ignored.txt": "ignore me" });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  it("hashes a file relative to the root", async () => {
    expect(await processFile(dir, "include.txt")).toEqual({
      path: "include.txt",
      hash: sha256("include me"),
    });
  });

  it("normalizes the stored path", async () => {
    const entry = await processFile(dir, "./sub\\..\\include.txt");
    expect(entry).toEqual({ path: "include.txt", hash: sha256("include me") });
  });

  it("rejects paths that leave the root", async () => {
    await expect(processFile(join(dir, "sub"), "../include.txt")).rejects.toBeInstanceOf(TraversalError);
    await expect(processFile(dir, "sub/../../x.txt")).rejects.toThrow(/Path must stay inside the root/);
  });

  it("returns null for an ignored file", async () => {
    const matcher = createIgnoreMatcher(["ignored.txt"]);
    expect(await processFile(dir, "sub/ignored.txt", matcher)).toBeNull();
  });
});
