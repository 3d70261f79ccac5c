import type { Layout } from "../destination.js";

export type TransferMode = "move" | "copy";

/**
 * Settings read from `organize-photos.json`
 */
export interface OrganizeConfig {
  /** Accepted file extensions, case-insensitive (e.g. ["jpg", ".dng"]) */
  extensions: string[];

  /** Destination layout: "month" = YYYY/MM, "day" = YYYY/YYYY-MM-DD */
  layout: Layout;

  /** Walk subdirectories of the source */
  recursive: boolean;

  /** Move files, or copy them and leave the source in place */
  mode: TransferMode;
}
