/**
 * Base class for every failure the organizer reports.
 */
export class OrganizeError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "OrganizeError";
  }
}

/** The source directory does not exist or is not a directory. */
export class NotFoundError extends OrganizeError {
  constructor(path: string, detail = "Directory not found", options?: { cause?: unknown }) {
    super(`${detail}: ${path}`, path, options);
    this.name = "NotFoundError";
  }
}

/** Read or write access was denied, or the destination root is unusable. */
export class AccessError extends OrganizeError {
  constructor(path: string, detail = "permission denied", options?: { cause?: unknown }) {
    super(`Cannot access ${path}: ${detail}`, path, options);
    this.name = "AccessError";
  }
}

export type MoveFailureReason = "exists" | "io";

/**
 * A single file could not be moved. The batch carries on after one of these.
 */
export class MoveError extends OrganizeError {
  constructor(
    readonly source: string,
    readonly destination: string | null,
    readonly reason: MoveFailureReason,
    options?: { cause?: unknown }
  ) {
    super(
      reason === "exists"
        ? `Destination already exists: ${destination ?? source}`
        : `Failed to move ${destination ? `${source} -> ${destination}` : source}: ${describeCause(options?.cause)}`,
      source,
      options
    );
    this.name = "MoveError";
  }
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
