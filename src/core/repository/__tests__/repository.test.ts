/**
 * Repository list and git fetcher tests (no network: only the parts that
 * run before git is invoked)
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { parseRepositoryList, readRepositoryList } from "../repository-list.js";
import { GitRepositoryFetcher, isValidIdentifier, shorterNameOf } from "../git-fetcher.js";
import { ErrorCode, RepositoryError } from "../../errors.js";

describe("parseRepositoryList", () => {
  it("should return one identifier per non-empty line", () => {
    expect(parseRepositoryList("acme/cpu\n\n  acme/soc  \r\n# acme/skipped\nacme/dsp")).toEqual([
      "acme/cpu",
      "acme/soc",
      "acme/dsp",
    ]);
  });

  it("should return nothing for an empty file", () => {
    expect(parseRepositoryList("")).toEqual([]);
  });
});

describe("readRepositoryList", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-list-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should read identifiers from disk", async () => {
    const file = path.join(tempDir, "repos.txt");
    await fs.writeFile(file, "acme/cpu\nacme/soc\n");

    expect(await readRepositoryList(file)).toEqual(["acme/cpu", "acme/soc"]);
  });

  it("should throw RepositoryError for a missing list", async () => {
    await expect(readRepositoryList(path.join(tempDir, "nope.txt"))).rejects.toMatchObject({
      name: "RepositoryError",
      code: ErrorCode.REPOSITORY_LIST_UNREADABLE,
    });
  });
});

describe("identifiers", () => {
  it("should accept owner/name", () => {
    expect(isValidIdentifier("acme/cpu-core.v2")).toBe(true);
  });

  it.each(["cpu", "acme/cpu/extra", "../etc", "acme/..", "./x", "acme/cpu core", ""])(
    "should reject %j",
    (identifier) => {
      expect(isValidIdentifier(identifier)).toBe(false);
    }
  );

  it("should clone into the name after the owner", () => {
    expect(shorterNameOf("acme/cpu")).toBe("cpu");
  });
});

describe("GitRepositoryFetcher", () => {
  it("should build clone URLs from the base URL", () => {
    const fetcher = new GitRepositoryFetcher({ baseUrl: "https://git.example.test/" });

    expect(fetcher.cloneUrlOf("acme/cpu")).toBe("https://git.example.test/acme/cpu.git");
  });

  it("should default to GitHub", () => {
    expect(new GitRepositoryFetcher().cloneUrlOf("acme/cpu")).toBe("https://github.com/acme/cpu.git");
  });

  it("should reject an invalid identifier before running git", async () => {
    const fetcher = new GitRepositoryFetcher({ gitBinary: "/nonexistent/git" });

    const error = await fetcher.fetch("../escape", os.tmpdir()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RepositoryError);
    expect(error instanceof RepositoryError && error.code).toBe(ErrorCode.REPOSITORY_INVALID_IDENTIFIER);
  });

  it("should leave a same-named directory alone when git fails", async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "fetch-test-"));
    try {
      await fs.mkdir(path.join(workDir, "rtl"));
      await fs.writeFile(path.join(workDir, "rtl", "Top.sv"), "module Top; endmodule\n");
      const fetcher = new GitRepositoryFetcher({ gitBinary: path.join(workDir, "no-git") });

      const error = await fetcher.fetch("someone/rtl", workDir).catch((e: unknown) => e);

      expect(error instanceof RepositoryError && error.code).toBe(ErrorCode.REPOSITORY_FETCH_FAILED);
      expect(await fs.readdir(workDir)).toEqual(["rtl"]);
      expect(await fs.readFile(path.join(workDir, "rtl", "Top.sv"), "utf-8")).toBe("module Top; endmodule\n");
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  });

  it("should clone into a fresh directory beside existing ones", async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "fetch-test-"));
    try {
      await fs.mkdir(path.join(workDir, "rtl"));
      await fs.writeFile(path.join(workDir, "rtl", "Top.sv"), "module Top; endmodule\n");
      // Stand-in git: writes a file into the clone target (its last argument)
      const git = path.join(workDir, "fake-git");
      await fs.writeFile(git, '#!/bin/sh\nfor last; do :; done\necho cloned > "$last/README"\n');
      await fs.chmod(git, 0o755);
      const fetcher = new GitRepositoryFetcher({ gitBinary: git });

      const target = await fetcher.fetch("someone/rtl", workDir);

      expect(path.dirname(target)).toBe(workDir);
      expect(path.basename(target).startsWith("rtl-")).toBe(true);
      expect(await fs.readFile(path.join(target, "README"), "utf-8")).toBe("cloned\n");
      expect(await fs.readdir(path.join(workDir, "rtl"))).toEqual(["Top.sv"]);

      await fetcher.cleanup(target);
      expect((await fs.readdir(workDir)).sort()).toEqual(["fake-git", "rtl"]);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  });

  it("should report a failing git as FETCH_FAILED and leave no directory", async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "fetch-test-"));
    try {
      const fetcher = new GitRepositoryFetcher({ gitBinary: path.join(workDir, "no-git") });

      const error = await fetcher.fetch("acme/cpu", workDir).catch((e: unknown) => e);

      expect(error instanceof RepositoryError && error.code).toBe(ErrorCode.REPOSITORY_FETCH_FAILED);
      expect(await fs.readdir(workDir)).toEqual([]);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  });
});
