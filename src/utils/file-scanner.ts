import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { AccessError, NotFoundError, errorCode } from "../errors.js";
import { logger } from "./logger.js";

export interface ScanOptions {
  extensions: ReadonlySet<string>; // lowercase with leading dot, e.g. ".jpg"
  recursive?: boolean;
  excludeDirs?: readonly string[]; // absolute paths never descended into
}

export interface ScanResult {
  /** Matching files, absolute, sorted */
  files: string[];
  /** Regular files rejected by the extension filter */
  ignored: number;
}

/**
 * Normalize extensions to lowercase with a leading dot, so `JPG`, `jpg`
 * and `.jpg` all match the same files. Comma separated values are split.
 */
export function normalizeExtensions(extensions: readonly string[]): Set<string> {
  const normalized = new Set<string>();
  for (const raw of extensions) {
    for (const part of raw.split(",")) {
      const trimmed = part.trim().toLowerCase();
      if (!trimmed || trimmed === ".") continue;
      normalized.add(trimmed.startsWith(".") ? trimmed : `.${trimmed}`);
    }
  }
  return normalized;
}

export function hasAcceptedExtension(filePath: string, extensions: ReadonlySet<string>): boolean {
  return extensions.has(path.extname(filePath).toLowerCase());
}

/**
 * Scan a directory for files with accepted extensions.
 * The root must be readable; unreadable subdirectories are skipped with a warning.
 */
export async function scanDirectory(dirPath: string, options: ScanOptions): Promise<ScanResult> {
  const root = path.resolve(dirPath);
  const result: ScanResult = { files: [], ignored: 0 };

  const entries = await readRoot(root);
  await collect(root, entries, options, result);

  result.files.sort();
  return result;
}

function isExcluded(dirPath: string, options: ScanOptions): boolean {
  return (options.excludeDirs ?? []).some((excluded) => path.resolve(excluded) === dirPath);
}

async function readRoot(dirPath: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    switch (errorCode(error)) {
      case "ENOENT":
        throw new NotFoundError(dirPath, "Directory not found", { cause: error });
      case "ENOTDIR":
        throw new NotFoundError(dirPath, "Not a directory", { cause: error });
      case "EACCES":
      case "EPERM":
        throw new AccessError(dirPath, "permission denied", { cause: error });
      default:
        throw error;
    }
  }
}

async function collect(
  dirPath: string,
  entries: Dirent[],
  options: ScanOptions,
  result: ScanResult
): Promise<void> {
  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      if (!options.recursive) continue;
      if (isExcluded(fullPath, options)) {
        logger.debug(`Excluding directory: ${fullPath}`);
        continue;
      }

      let children: Dirent[];
      try {
        children = await fs.readdir(fullPath, { withFileTypes: true });
      } catch (error) {
        logger.warn(`Skipping unreadable directory ${fullPath}: ${errorCode(error) ?? String(error)}`);
        continue;
      }
      await collect(fullPath, children, options, result);
    } else if (entry.isFile()) {
      if (hasAcceptedExtension(entry.name, options.extensions)) {
        result.files.push(fullPath);
      } else {
        logger.debug(`Skipping non-allowlisted file ${fullPath}`);
        result.ignored++;
      }
    }
  }
}
