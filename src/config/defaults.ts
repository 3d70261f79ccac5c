import type { OrganizeConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "organize-photos.json";

export const defaultConfig: OrganizeConfig = {
  extensions: ["jpg", "dng", "arw"],
  layout: "month",
  recursive: false,
  mode: "move",
};
