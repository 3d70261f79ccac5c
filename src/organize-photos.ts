import fs from "node:fs/promises";
import { constants as fsConstants, type Stats } from "node:fs";
import path from "node:path";
import { AccessError, MoveError, errorCode } from "./errors.js";
import { fileSystemCreationTime, type CreationTimeProvider } from "./creation-time.js";
import { buildTargetPath, type Layout } from "./destination.js";
import type { TransferMode } from "./config/types.js";
import { normalizeExtensions, scanDirectory } from "./utils/file-scanner.js";
import { logger } from "./utils/logger.js";

export interface OrganizeRequest {
  sourceDir: string;
  destinationRoot: string;
  extensions: readonly string[];
  layout?: Layout;
  recursive?: boolean;
  mode?: TransferMode;
  dryRun?: boolean;
}

export interface OrganizeOptions {
  /** Where file dates come from; defaults to filesystem timestamps */
  creationTime?: CreationTimeProvider;
}

export interface FileMove {
  source: string;
  destination: string;
  createdAt: Date;
}

export interface OrganizeResult {
  moves: FileMove[];
  moved: number;
  ignored: number;
  failures: MoveError[];
  dryRun: boolean;
}

/**
 * Move (or copy) every accepted file in the source directory into a
 * date-based tree under the destination root.
 *
 * Setup problems throw before anything on disk changes. Failures on
 * individual files are collected in `failures` and the rest of the batch
 * still runs.
 */
export async function organizePhotos(
  request: OrganizeRequest,
  options: OrganizeOptions = {}
): Promise<OrganizeResult> {
  const {
    layout = "month",
    recursive = false,
    mode = "move",
    dryRun = false,
  } = request;
  const creationTime = options.creationTime ?? fileSystemCreationTime;
  const sourceDir = path.resolve(request.sourceDir);
  const destinationRoot = path.resolve(request.destinationRoot);

  const extensions = normalizeExtensions(request.extensions);
  if (extensions.size === 0) {
    throw new Error("At least one file extension is required");
  }

  logger.debug(`Scanning ${sourceDir} for ${[...extensions].join(", ")}`);
  const scan = await scanDirectory(sourceDir, {
    extensions,
    recursive,
    excludeDirs: [destinationRoot],
  });
  await checkDestinationRoot(destinationRoot);
  logger.info(`Found ${scan.files.length} files to organize, ${scan.ignored} ignored`);

  const result: OrganizeResult = {
    moves: [],
    moved: 0,
    ignored: scan.ignored,
    failures: [],
    dryRun,
  };
  const claimed = new Set<string>();

  for (const source of scan.files) {
    let destination: string | null = null;
    try {
      const createdAt = await creationTime.getCreationTime(source);
      if (Number.isNaN(createdAt.getTime())) {
        throw new MoveError(source, null, "io", {
          cause: new Error("creation time is not a valid date"),
        });
      }
      destination = buildTargetPath(source, destinationRoot, createdAt, layout);

      if (claimed.has(destination) || (await pathExists(destination))) {
        throw new MoveError(source, destination, "exists");
      }
      claimed.add(destination);

      if (dryRun) {
        logger.info(`WOULD ${mode === "copy" ? "COPY" : "MOVE"}: ${source} -> ${destination}`);
      } else {
        await fs.mkdir(path.dirname(destination), { recursive: true });
        await transfer(source, destination, mode);
        logger.info(`${mode === "copy" ? "COPIED" : "MOVED"}: ${source} -> ${destination}`);
      }

      result.moves.push({ source, destination, createdAt });
      result.moved++;
    } catch (error) {
      const failure =
        error instanceof MoveError ? error : toMoveError(source, destination, error);
      logger.error(failure.message);
      result.failures.push(failure);
    }
  }

  return result;
}

/**
 * The root may not exist yet; when it does it must be a writable directory.
 */
async function checkDestinationRoot(destinationRoot: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(destinationRoot);
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT") return;
    if (code === "EACCES" || code === "EPERM") {
      throw new AccessError(destinationRoot, "permission denied", { cause: error });
    }
    if (code === "ENOTDIR") {
      throw new AccessError(destinationRoot, "a parent path is not a directory", { cause: error });
    }
    throw error;
  }

  if (!stats.isDirectory()) {
    throw new AccessError(destinationRoot, "not a directory");
  }

  try {
    await fs.access(destinationRoot, fsConstants.W_OK | fsConstants.X_OK);
  } catch (error) {
    throw new AccessError(destinationRoot, "not writable", { cause: error });
  }
}

async function transfer(source: string, destination: string, mode: TransferMode): Promise<void> {
  if (mode === "copy") {
    await copyExclusive(source, destination);
    return;
  }
  await moveExclusive(source, destination);
}

// link(2) can't cross filesystems and FAT-style volumes have no hard links
const LINK_UNSUPPORTED = new Set(["EXDEV", "EPERM", "ENOTSUP", "ENOSYS"]);

/**
 * Move without replacing an existing destination: link then unlink, or
 * copy then unlink where linking isn't possible.
 */
async function moveExclusive(source: string, destination: string): Promise<void> {
  try {
    await fs.link(source, destination);
  } catch (error) {
    const code = errorCode(error);
    if (code === "EEXIST") {
      throw new MoveError(source, destination, "exists", { cause: error });
    }
    if (code === undefined || !LINK_UNSUPPORTED.has(code)) throw error;

    await copyExclusive(source, destination);
    const stats = await fs.stat(source);
    await fs.utimes(destination, stats.atime, stats.mtime);
  }
  await fs.unlink(source);
}

async function copyExclusive(source: string, destination: string): Promise<void> {
  try {
    await fs.copyFile(source, destination, fsConstants.COPYFILE_EXCL);
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      throw new MoveError(source, destination, "exists", { cause: error });
    }
    throw error;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === "ENOENT") return false;
    throw error;
  }
}

function toMoveError(source: string, destination: string | null, error: unknown): MoveError {
  return new MoveError(source, destination, "io", { cause: error });
}
