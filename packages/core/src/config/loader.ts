/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { LinguamergeConfig, LoadConfigResult } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';
import { isErrnoException } from '../errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search upward through directories for a file.
 */
async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10;

  for (let depth = 0; depth <= maxDepth; depth++) {
    const filePath = path.join(currentDir, filename);
    if (await fileExists(filePath)) {
      return filePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Load and parse a config file from a specific path.
 */
async function readConfigFile(resolvedPath: string): Promise<Record<string, unknown>> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`Config file not found at ${resolvedPath}. Run "linguamerge init" to create one.`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read config file at ${resolvedPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContents);
  } catch (error) {
    throw new Error(
      `Config file at ${resolvedPath} contains invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file at ${resolvedPath} must contain a JSON object.`);
  }

  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Load config with upward directory traversal.
 *
 * When `configPath` is the default file name and no such file exists, the
 * defaults are returned with the working directory as project root. An
 * explicitly named file that does not exist is an error.
 */
export async function loadConfigWithMeta(
  configPath = DEFAULT_CONFIG_FILENAME,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  let resolvedPath: string | undefined;

  if (path.isAbsolute(configPath)) {
    resolvedPath = configPath;
  } else if (configPath === DEFAULT_CONFIG_FILENAME) {
    resolvedPath = (await findUp(configPath, cwd)) ?? undefined;
  } else {
    resolvedPath = path.resolve(cwd, configPath);
  }

  if (!resolvedPath) {
    const config = normalizeConfig({});
    assertConfigValid(config);
    return { config, projectRoot: cwd };
  }

  const rawConfig = await readConfigFile(resolvedPath);
  const config = normalizeConfig(rawConfig);
  assertConfigValid(config);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
  };
}

/**
 * Load config file (simplified API).
 */
export async function loadConfig(configPath = DEFAULT_CONFIG_FILENAME): Promise<LinguamergeConfig> {
  const result = await loadConfigWithMeta(configPath);
  return result.config;
}

/** Catalog file for one locale: `<base>_<locale><extension>`, resolved against `projectRoot`. */
export function catalogPathFor(config: LinguamergeConfig, locale: string, projectRoot = process.cwd()): string {
  return path.resolve(projectRoot, `${config.catalogBase}_${locale}${config.catalogExtension}`);
}
