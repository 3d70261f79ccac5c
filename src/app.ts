import { buildApplication, buildCommand } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import { loadConfig } from "./config/config.js";
import type { Layout } from "./destination.js";
import { organizePhotos } from "./organize-photos.js";
import { buildRequest } from "./request.js";
import { logger } from "./utils/logger.js";

interface OrganizeFlags {
  filetypes?: string[];
  layout?: Layout;
  recursive?: boolean;
  copy?: boolean;
  "dry-run": boolean;
  verbose: boolean;
  quiet: boolean;
  config?: string;
}

const organizeCommand = buildCommand({
  docs: {
    brief: "Move photos from source into destination, organized by creation date",
  },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "Source directory (e.g., /media/card/DCIM/100CANON)",
          parse: String,
          placeholder: "source",
        },
        {
          brief: "Destination root (e.g., ~/Pictures)",
          parse: String,
          placeholder: "destination",
        },
      ],
    },
    flags: {
      filetypes: {
        kind: "parsed",
        brief: "File extension to include (jpg, dng, ...). Can be specified multiple times or comma separated.",
        parse: String,
        variadic: true,
        optional: true,
      },
      layout: {
        kind: "enum",
        brief: "Folder layout: month = YYYY/MM, day = YYYY/YYYY-MM-DD",
        values: ["month", "day"] as const,
        optional: true,
      },
      recursive: {
        kind: "boolean",
        brief: "Also organize files in subdirectories of source",
        optional: true,
      },
      copy: {
        kind: "boolean",
        brief: "Copy files instead of moving them",
        optional: true,
      },
      "dry-run": {
        kind: "boolean",
        brief: "Preview changes without touching any files",
        default: false,
      },
      verbose: {
        kind: "boolean",
        brief: "Enable debug logging",
        default: false,
      },
      quiet: {
        kind: "boolean",
        brief: "Only print warnings and errors while organizing",
        default: false,
      },
      config: {
        kind: "parsed",
        brief: "Path to config JSON file (default: ./organize-photos.json)",
        parse: String,
        optional: true,
      },
    },
    aliases: {
      t: "filetypes",
      l: "layout",
      r: "recursive",
      n: "dry-run",
      v: "verbose",
      q: "quiet",
      c: "config",
    },
  },
  async func(
    this: CommandContext,
    flags: OrganizeFlags,
    source: string,
    destination: string
  ): Promise<void> {
    if (flags.verbose) {
      logger.setLevel("debug");
    } else if (flags.quiet) {
      logger.setLevel("warn");
    }

    try {
      const config = await loadConfig(flags.config);
      const request = buildRequest(source, destination, config, {
        filetypes: flags.filetypes,
        layout: flags.layout,
        recursive: flags.recursive,
        copy: flags.copy,
        dryRun: flags["dry-run"],
      });
      const verb = request.mode === "copy" ? "COPY" : "MOVE";

      console.log(`Organize Photos`);
      console.log(`===============`);
      console.log(`Source:      ${request.sourceDir}`);
      console.log(`Destination: ${request.destinationRoot}`);
      console.log(`Types:       ${request.extensions.join(", ")}`);
      console.log(`Mode:        ${request.dryRun ? `DRY RUN (no files will be touched)` : verb}`);
      console.log();

      const result = await organizePhotos(request);

      const done = request.mode === "copy" ? "Copied" : "Moved";
      console.log();
      console.log(`Summary`);
      console.log(`-------`);
      console.log(`${request.dryRun ? `Would ${verb.toLowerCase()}` : done}: ${result.moved} files`);
      console.log(`Ignored: ${result.ignored} files (not an accepted type)`);
      if (result.failures.length > 0) {
        console.log(`Errors:  ${result.failures.length}`);
        process.exitCode = 2;
      } else {
        logger.success("Organize complete!");
      }
    } catch (error) {
      console.error("Error:", error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  },
});

// -v belongs to --verbose, so no version flag is registered
export const app = buildApplication(organizeCommand, {
  name: "organize-photos",
});
