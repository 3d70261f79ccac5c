import * as path from "node:path";

export type Layout = "month" | "day";

export const LAYOUTS: readonly Layout[] = ["month", "day"];

/**
 * Build the destination path for a file.
 *
 * - `month`: `<root>/YYYY/MM/<file>`
 * - `day`:   `<root>/YYYY/YYYY-MM-DD/<file>`
 */
export function buildTargetPath(
  sourceFile: string,
  targetDir: string,
  date: Date,
  layout: Layout = "month"
): string {
  const year = date.getFullYear().toString();
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const filename = path.basename(sourceFile);

  if (layout === "day") {
    const day = date.getDate().toString().padStart(2, "0");
    return path.join(targetDir, year, `${year}-${month}-${day}`, filename);
  }

  return path.join(targetDir, year, month, filename);
}

