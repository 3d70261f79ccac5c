import type { Layout } from "./destination.js";
import type { OrganizeConfig } from "./config/types.js";
import type { OrganizeRequest } from "./organize-photos.js";

export interface RequestOverrides {
  filetypes?: string[];
  layout?: Layout;
  recursive?: boolean;
  copy?: boolean;
  dryRun?: boolean;
}

/**
 * Combine loaded config with command-line overrides; flags win.
 */
export function buildRequest(
  sourceDir: string,
  destinationRoot: string,
  config: OrganizeConfig,
  overrides: RequestOverrides = {}
): OrganizeRequest {
  const extensions =
    overrides.filetypes && overrides.filetypes.length > 0
      ? overrides.filetypes
      : config.extensions;

  let mode = config.mode;
  if (overrides.copy !== undefined) {
    mode = overrides.copy ? "copy" : "move";
  }

  return {
    sourceDir,
    destinationRoot,
    extensions,
    layout: overrides.layout ?? config.layout,
    recursive: overrides.recursive ?? config.recursive,
    mode,
    dryRun: overrides.dryRun ?? false,
  };
}
