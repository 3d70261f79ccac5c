import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { normalizeExtensions, scanDirectory } from "./file-scanner.js";
import { AccessError, NotFoundError } from "../errors.js";

describe("normalizeExtensions", () => {
  it("lowercases and adds a leading dot", () => {
    expect([...normalizeExtensions(["JPG", ".png", "Dng"])]).toEqual([".jpg", ".png", ".dng"]);
  });

  it("splits comma separated values and drops blanks", () => {
    expect([...normalizeExtensions(["jpg, arw", "", " ."])]).toEqual([".jpg", ".arw"]);
  });

  it("deduplicates equivalent spellings", () => {
    expect(normalizeExtensions(["jpg", ".JPG", "Jpg"]).size).toBe(1);
  });
});

describe("file-scanner", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "organize-photos-scan-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("scanDirectory", () => {
    it("returns matching files sorted and counts the rest as ignored", async () => {
      await fs.writeFile(path.join(tempDir, "b.png"), "test");
      await fs.writeFile(path.join(tempDir, "a.jpg"), "test");
      await fs.writeFile(path.join(tempDir, "c.txt"), "test");

      const result = await scanDirectory(tempDir, {
        extensions: normalizeExtensions(["jpg", "png"]),
      });

      expect(result.files).toEqual([path.join(tempDir, "a.jpg"), path.join(tempDir, "b.png")]);
      expect(result.ignored).toBe(1);
    });

    it("matches extensions case-insensitively", async () => {
      await fs.writeFile(path.join(tempDir, "IMG_0001.JPG"), "test");

      const result = await scanDirectory(tempDir, { extensions: normalizeExtensions(["jpg"]) });

      expect(result.files).toEqual([path.join(tempDir, "IMG_0001.JPG")]);
    });

    it("does not descend into subdirectories by default", async () => {
      await fs.mkdir(path.join(tempDir, "nested"));
      await fs.writeFile(path.join(tempDir, "nested", "deep.jpg"), "test");
      await fs.writeFile(path.join(tempDir, "top.jpg"), "test");

      const result = await scanDirectory(tempDir, { extensions: normalizeExtensions(["jpg"]) });

      expect(result.files).toEqual([path.join(tempDir, "top.jpg")]);
      expect(result.ignored).toBe(0);
    });

    it("walks subdirectories when recursive", async () => {
      await fs.mkdir(path.join(tempDir, "nested", "deeper"), { recursive: true });
      await fs.writeFile(path.join(tempDir, "nested", "deeper", "deep.jpg"), "test");
      await fs.writeFile(path.join(tempDir, "top.jpg"), "test");

      const result = await scanDirectory(tempDir, {
        extensions: normalizeExtensions(["jpg"]),
        recursive: true,
      });

      expect(result.files).toEqual([
        path.join(tempDir, "nested", "deeper", "deep.jpg"),
        path.join(tempDir, "top.jpg"),
      ]);
    });

    it("skips excluded directories when recursive", async () => {
      const organized = path.join(tempDir, "organized");
      await fs.mkdir(organized);
      await fs.writeFile(path.join(organized, "done.jpg"), "test");
      await fs.writeFile(path.join(tempDir, "new.jpg"), "test");

      const result = await scanDirectory(tempDir, {
        extensions: normalizeExtensions(["jpg"]),
        recursive: true,
        excludeDirs: [organized],
      });

      expect(result.files).toEqual([path.join(tempDir, "new.jpg")]);
    });

    it("returns empty result for empty directory", async () => {
      const result = await scanDirectory(tempDir, { extensions: normalizeExtensions(["jpg"]) });
      expect(result).toEqual({ files: [], ignored: 0 });
    });

    it("throws NotFoundError for a missing directory", async () => {
      await expect(
        scanDirectory(path.join(tempDir, "missing"), { extensions: normalizeExtensions(["jpg"]) })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("throws NotFoundError when the path is a file", async () => {
      const filePath = path.join(tempDir, "a.jpg");
      await fs.writeFile(filePath, "test");

      await expect(
        scanDirectory(filePath, { extensions: normalizeExtensions(["jpg"]) })
      ).rejects.toThrow(`Not a directory: ${filePath}`);
    });

    it("throws AccessError when the directory cannot be read", async () => {
      vi.spyOn(fs, "readdir").mockRejectedValueOnce(
        Object.assign(new Error("EACCES: simulated"), { code: "EACCES" })
      );

      const scan = scanDirectory(tempDir, { extensions: normalizeExtensions(["jpg"]) });

      await expect(scan).rejects.toBeInstanceOf(AccessError);
      await expect(scan).rejects.toThrow(`Cannot access ${tempDir}: permission denied`);
    });
  });
});
