import * as fs from "node:fs";

/**
 * Supplies the date a file is organized by. The filesystem provider is the
 * only one today; a capture-time provider reading embedded metadata can
 * replace it without touching the scan or move logic.
 */
export interface CreationTimeProvider {
  getCreationTime(filePath: string): Promise<Date>;
}

export type TimestampStats = Pick<fs.Stats, "birthtime" | "birthtimeMs" | "mtime">;

/**
 * Birth time when the filesystem records one, otherwise modification time.
 * Filesystems without birth time support report the epoch.
 */
export function creationDateFromStats(stats: TimestampStats): Date {
  if (stats.birthtimeMs > 0) {
    return stats.birthtime;
  }
  return stats.mtime;
}

export const fileSystemCreationTime: CreationTimeProvider = {
  async getCreationTime(filePath: string): Promise<Date> {
    const stats = await fs.promises.stat(filePath);
    return creationDateFromStats(stats);
  },
};
