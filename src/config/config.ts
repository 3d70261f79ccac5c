import fs from "node:fs/promises";
import path from "node:path";
import { errorCode } from "../errors.js";
import { LAYOUTS } from "../destination.js";
import type { OrganizeConfig } from "./types.js";
import { DEFAULT_CONFIG_FILE, defaultConfig } from "./defaults.js";

/**
 * Load configuration from the first available source:
 * 1. Explicit path (--config flag), which must exist
 * 2. organize-photos.json in the working directory
 *
 * Falls back to defaults if neither is found.
 */
export async function loadConfig(
  explicitPath?: string,
  cwd: string = process.cwd()
): Promise<OrganizeConfig> {
  if (explicitPath) {
    const configPath = path.resolve(cwd, explicitPath);
    const content = await readConfigFile(configPath);
    if (content === null) {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    return parseConfig(content, configPath);
  }

  const implicitPath = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  const content = await readConfigFile(implicitPath);
  if (content === null) {
    return { ...defaultConfig, extensions: [...defaultConfig.extensions] };
  }
  return parseConfig(content, implicitPath);
}

async function readConfigFile(configPath: string): Promise<string | null> {
  try {
    return await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Parse and validate a config document, merging it over defaults
 */
export function parseConfig(content: string, source = "<inline>"): OrganizeConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Configuration error: ${source} is not valid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }

  if (!isRecord(parsed)) {
    throw new Error(`Configuration error: ${source} must contain a JSON object`);
  }

  return mergeConfig(defaultConfig, validateConfig(parsed));
}

/**
 * Merge a partial config over defaults.
 */
export function mergeConfig(
  defaults: OrganizeConfig,
  override: Partial<OrganizeConfig>
): OrganizeConfig {
  return {
    extensions: [...(override.extensions ?? defaults.extensions)],
    layout: override.layout ?? defaults.layout,
    recursive: override.recursive ?? defaults.recursive,
    mode: override.mode ?? defaults.mode,
  };
}

function validateConfig(raw: Record<string, unknown>): Partial<OrganizeConfig> {
  const config: Partial<OrganizeConfig> = {};

  if (raw.extensions !== undefined) {
    const { extensions } = raw;
    if (!Array.isArray(extensions) || !extensions.every((e): e is string => typeof e === "string")) {
      throw new Error("Configuration error: extensions must be an array of strings");
    }
    if (extensions.length === 0) {
      throw new Error("Configuration error: extensions must contain at least one entry");
    }
    config.extensions = extensions;
  }

  if (raw.layout !== undefined) {
    const layout = LAYOUTS.find((l) => l === raw.layout);
    if (!layout) {
      throw new Error('Configuration error: layout must be "month" or "day"');
    }
    config.layout = layout;
  }

  const { recursive, mode } = raw;

  if (recursive !== undefined) {
    if (typeof recursive !== "boolean") {
      throw new Error("Configuration error: recursive must be true or false");
    }
    config.recursive = recursive;
  }

  if (mode !== undefined) {
    if (mode !== "move" && mode !== "copy") {
      throw new Error('Configuration error: mode must be "move" or "copy"');
    }
    config.mode = mode;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
